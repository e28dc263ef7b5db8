import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

/** Devices that reboot as a single action, such as routers. */
export interface Reboot {
  reboot(): Awaitable<void>;
}

export const rebootTrait: TraitDefinition<Reboot> = {};
