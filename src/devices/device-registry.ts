/**
 * The device collection a fulfillment serves.
 *
 * Filled during setup and read during request handling.  Ids are not
 * required to be unique: lookups resolve to the first device added with
 * a given id, and `remove()` drops every device carrying it.
 */

import type { Device } from './device';
import type { DeviceType } from './device-type';

export class DeviceRegistry {
  private devices: Device[] = [];

  /** Add a device.  Its capability slots are fixed from here on. */
  add(device: Device): void {
    device.seal();
    this.devices.push(device);
  }

  /** Remove every device with the given id.  Returns how many were removed. */
  remove(id: string): number {
    const before = this.devices.length;
    this.devices = this.devices.filter((d) => d.id !== id);
    return before - this.devices.length;
  }

  /** First device added with the given id. */
  find(id: string): Device | undefined {
    return this.devices.find((d) => d.id === id);
  }

  /** List devices in insertion order, optionally filtered by device type. */
  list(type?: DeviceType): Device[] {
    if (!type) return [...this.devices];
    return this.devices.filter((d) => d.type === type);
  }

  has(id: string): boolean {
    return this.devices.some((d) => d.id === id);
  }

  get size(): number {
    return this.devices.length;
  }
}
