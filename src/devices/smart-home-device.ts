/**
 * Identity contract every device implements, whatever traits it opts into.
 */

import type { Awaitable } from '../traits/common';

export interface DeviceInfo {
  manufacturer: string;
  model: string;
  hwVersion: string;
  swVersion: string;
}

export interface DeviceName {
  /** Primary name shown to the user. */
  name: string;
  /** Names given by the manufacturer. */
  defaultNames: string[];
  /** Names the user gave the device. */
  nicknames: string[];
}

export interface SmartHomeDevice {
  getDeviceInfo(): Awaitable<DeviceInfo>;
  getDeviceName(): Awaitable<DeviceName>;
  getRoomHint?(): Awaitable<string | undefined>;
  /** Whether the device pushes state changes on its own. */
  willReportState(): Awaitable<boolean>;
  isOnline(): Awaitable<boolean>;
  /** Called when the user unlinks their account. */
  disconnect?(): Awaitable<void>;
}
