import type { Awaitable, Language } from './common';
import type { TraitDefinition } from './trait-definition';

/** Devices that can be found: phones, robots, drones and trackers. */
export interface Locator {
  /**
   * Generate a local alert.  `silence` asks the device to silence an
   * in-progress alarm; `lang` is the language of any localized response.
   */
  locate(silence: boolean, lang: Language): Awaitable<void>;
}

export const locatorTrait: TraitDefinition<Locator> = {};
