import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

/** Self-mobile devices that can be sent back to charge. */
export interface Dock {
  isDocked(): Awaitable<boolean>;
  dock(): Awaitable<void>;
}

export const dockTrait: TraitDefinition<Dock> = {
  async states(cap: DeviceHandle<Dock>) {
    return { isDocked: await cap.use((d) => d.isDocked()) };
  },
};
