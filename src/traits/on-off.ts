/**
 * OnOff: binary on and off, for plugs, switches and most other devices.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface OnOff {
  isCommandOnlyOnOff?(): Awaitable<boolean | undefined>;
  isQueryOnlyOnOff?(): Awaitable<boolean | undefined>;
  isOn(): Awaitable<boolean>;
  setOn(on: boolean): Awaitable<void>;
}

export const onOffTrait: TraitDefinition<OnOff> = {
  async attributes(cap: DeviceHandle<OnOff>) {
    return compact({
      commandOnlyOnOff: await cap.use((d) => d.isCommandOnlyOnOff?.()),
      queryOnlyOnOff: await cap.use((d) => d.isQueryOnlyOnOff?.()),
    });
  },
  async states(cap: DeviceHandle<OnOff>) {
    return { on: await cap.use((d) => d.isOn()) };
  },
};
