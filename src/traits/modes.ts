/**
 * Modes: an arbitrary number of "n-way" modes, each with settings of
 * which exactly one is selected at a time (a washer's load size or water
 * temperature).  Settings that are simply on or off belong in Toggles.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, Language, NameSynonyms } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface ModeSetting {
  setting_name: string;
  setting_values: Array<{
    setting_synonym: string[];
    lang: Language;
  }>;
}

export interface AvailableMode {
  /** Internal name used in commands and states. */
  name: string;
  name_values: NameSynonyms[];
  /** At least two settings. */
  settings: ModeSetting[];
  ordered: boolean;
}

export interface Modes {
  getAvailableModes(): Awaitable<AvailableMode[]>;
  isCommandOnlyModes?(): Awaitable<boolean | undefined>;
  isQueryOnlyModes?(): Awaitable<boolean | undefined>;
  /** Mode name to the name of its current setting. */
  getCurrentModeSettings(): Awaitable<Record<string, string>>;
  updateMode(modeName: string, settingName: string): Awaitable<void>;
}

export const modesTrait: TraitDefinition<Modes> = {
  async attributes(cap: DeviceHandle<Modes>) {
    return compact({
      availableModes: await cap.use((d) => d.getAvailableModes()),
      commandOnlyModes: await cap.use((d) => d.isCommandOnlyModes?.()),
      queryOnlyModes: await cap.use((d) => d.isQueryOnlyModes?.()),
    });
  },
  async states(cap: DeviceHandle<Modes>) {
    return {
      currentModeSettings: await cap.use((d) => d.getCurrentModeSettings()),
    };
  },
};
