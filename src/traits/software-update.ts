import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

/** Devices that install software updates, such as routers. */
export interface SoftwareUpdate {
  getLastSoftwareUpdateUnixTimestampSec(): Awaitable<number>;
  performUpdate(): Awaitable<void>;
}

export const softwareUpdateTrait: TraitDefinition<SoftwareUpdate> = {
  async states(cap: DeviceHandle<SoftwareUpdate>) {
    return {
      lastSoftwareUpdateUnixTimestampSec: await cap.use((d) =>
        d.getLastSoftwareUpdateUnixTimestampSec(),
      ),
    };
  },
};
