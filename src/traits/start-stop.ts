/**
 * StartStop: devices whose operation is started and stopped separately
 * from being turned on, such as washers, sprinklers and vacuums.
 * Devices may pause and may run in named zones.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface StartStop {
  isPausable?(): Awaitable<boolean | undefined>;
  /** Zone names as set by the user.  The list is not exclusive. */
  getAvailableZones?(): Awaitable<string[] | undefined>;
  isRunning(): Awaitable<boolean>;
  /** A paused device is not running but can resume. */
  isPaused?(): Awaitable<boolean | undefined>;
  getActiveZones?(): Awaitable<string[] | undefined>;
  startStop(start: boolean, zones?: string[]): Awaitable<void>;
  pauseUnpause(pause: boolean): Awaitable<void>;
}

export const startStopTrait: TraitDefinition<StartStop> = {
  async attributes(cap: DeviceHandle<StartStop>) {
    return compact({
      pausable: await cap.use((d) => d.isPausable?.()),
      availableZones: await cap.use((d) => d.getAvailableZones?.()),
    });
  },
  async states(cap: DeviceHandle<StartStop>) {
    return compact({
      isRunning: await cap.use((d) => d.isRunning()),
      isPaused: await cap.use((d) => d.isPaused?.()),
      activeZones: await cap.use((d) => d.getActiveZones?.()),
    });
  },
};
