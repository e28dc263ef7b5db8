/**
 * StatusReport: the current status of a device or of a connected group
 * of devices, such as a security system and its sensors.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

export interface CurrentStatusReport {
  /** True when the status blocks further commands. */
  blocking: boolean;
  deviceTarget: string;
  /** 0 is the highest priority. */
  priority: number;
  statusCode?: string;
}

export interface StatusReport {
  getCurrentStatusReport(): Awaitable<CurrentStatusReport[]>;
}

export const statusReportTrait: TraitDefinition<StatusReport> = {
  async states(cap: DeviceHandle<StatusReport>) {
    return {
      currentStatusReport: await cap.use((d) => d.getCurrentStatusReport()),
    };
  },
};
