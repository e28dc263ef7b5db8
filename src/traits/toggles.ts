/**
 * Toggles: settings that exist in exactly one of two states.  Settings
 * with more states, or binary states that are not on/off ("AM/FM"),
 * belong in Modes.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, NameSynonyms } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface AvailableToggle {
  /** Internal name used in commands and states. */
  name: string;
  name_values: NameSynonyms[];
}

export interface Toggles {
  getAvailableToggles(): Awaitable<AvailableToggle[]>;
  isCommandOnlyToggles?(): Awaitable<boolean | undefined>;
  isQueryOnlyToggles?(): Awaitable<boolean | undefined>;
  getCurrentToggleSettings(): Awaitable<Record<string, boolean>>;
  setToggle(name: string, value: boolean): Awaitable<void>;
}

export const togglesTrait: TraitDefinition<Toggles> = {
  async attributes(cap: DeviceHandle<Toggles>) {
    return compact({
      availableToggles: await cap.use((d) => d.getAvailableToggles()),
      commandOnlyToggles: await cap.use((d) => d.isCommandOnlyToggles?.()),
      queryOnlyToggles: await cap.use((d) => d.isQueryOnlyToggles?.()),
    });
  },
  async states(cap: DeviceHandle<Toggles>) {
    return {
      currentToggleSettings: await cap.use((d) => d.getCurrentToggleSettings()),
    };
  },
};
