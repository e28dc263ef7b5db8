/**
 * A device exposed to the fulfillment platform.
 *
 * Wraps one concrete implementation behind a single `DeviceHandle` and
 * keeps a table of capability slots, one per trait.  Each populated slot
 * aliases the same handle, so state changed through one trait is seen by
 * every other trait and by the identity contract.  `traits` lists the
 * populated slots in registration order, which is the order SYNC reports.
 */

import { UnsupportedCapabilityError } from '../errors';
import type { CapabilityMap, TraitName } from '../traits';
import { DeviceHandle } from './device-handle';
import type { DeviceType } from './device-type';
import type { DeviceInfo, DeviceName, SmartHomeDevice } from './smart-home-device';

type SlotTable = { [K in TraitName]?: DeviceHandle<CapabilityMap[K]> };

export interface DeviceIdentity {
  name: DeviceName;
  info: DeviceInfo;
  roomHint?: string;
  willReportState: boolean;
}

export class Device<T extends SmartHomeDevice = SmartHomeDevice> {
  readonly id: string;
  readonly type: DeviceType;
  private readonly handle: DeviceHandle<T>;
  private readonly slots: SlotTable = {};
  private readonly registered: TraitName[] = [];
  private sealed = false;

  /** `id` must stay stable across restarts. */
  constructor(device: T, type: DeviceType, id: string) {
    this.id = id;
    this.type = type;
    this.handle = new DeviceHandle(device);
  }

  /**
   * Populate the slot for `tag`.  Only compiles when the wrapped device
   * implements the trait's interface.  Slots are fixed once the device
   * has been handed to a fulfillment.
   */
  register<K extends TraitName, D extends Device<SmartHomeDevice & CapabilityMap[K]>>(this: D, tag: K): D {
    if (this.sealed) {
      throw new Error(`Cannot register ${tag} on device ${this.id} after it has been added`);
    }
    if (this.slots[tag] !== undefined) {
      throw new Error(`Trait ${tag} is already registered on device ${this.id}`);
    }
    const slot: DeviceHandle<CapabilityMap[K]> = this.handle;
    const slots: { [P in K]?: DeviceHandle<CapabilityMap[P]> } = this.slots;
    slots[tag] = slot;
    this.registered.push(tag);
    return this;
  }

  /** Registered traits, in registration order. */
  get traits(): readonly TraitName[] {
    return this.registered;
  }

  supports(tag: TraitName): boolean {
    return this.slots[tag] !== undefined;
  }

  /** The handle in slot `tag`; throws when the trait was never registered. */
  capability<K extends TraitName>(tag: K): DeviceHandle<CapabilityMap[K]> {
    const slot: DeviceHandle<CapabilityMap[K]> | undefined = this.slots[tag];
    if (slot === undefined) {
      throw new UnsupportedCapabilityError(this.id, tag);
    }
    return slot;
  }

  // -----------------------------------------------------------------------
  // Identity contract
  // -----------------------------------------------------------------------

  async identity(): Promise<DeviceIdentity> {
    const name = await this.handle.use((d) => d.getDeviceName());
    const info = await this.handle.use((d) => d.getDeviceInfo());
    const roomHint = await this.handle.use((d) => d.getRoomHint?.());
    const willReportState = await this.handle.use((d) => d.willReportState());
    return { name, info, ...(roomHint !== undefined ? { roomHint } : {}), willReportState };
  }

  isOnline(): Promise<boolean> {
    return this.handle.use((d) => d.isOnline());
  }

  disconnect(): Promise<void> {
    return this.handle.use((d) => d.disconnect?.());
  }

  /** Freeze the slot table.  Called when the device joins a registry. */
  seal(): void {
    this.sealed = true;
  }
}
