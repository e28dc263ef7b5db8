/**
 * AppSelector: devices that run media applications, typically from
 * third parties.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, NameSynonyms } from './common';
import type { TraitDefinition } from './trait-definition';

export interface AvailableApplication {
  /** Unique key, never exposed to users. */
  key: string;
  /** Language-specific synonyms; the first synonym is used in responses. */
  names: NameSynonyms[];
}

export interface AppSelector {
  getAvailableApplications(): Awaitable<AvailableApplication[]>;
  /** Key of the application currently in the foreground. */
  getCurrentApplication(): Awaitable<string>;
  appInstallKey(key: string): Awaitable<void>;
  appInstallName(name: string): Awaitable<void>;
  appSearchKey(key: string): Awaitable<void>;
  appSearchName(name: string): Awaitable<void>;
  appSelectKey(key: string): Awaitable<void>;
  appSelectName(name: string): Awaitable<void>;
}

export const appSelectorTrait: TraitDefinition<AppSelector> = {
  async attributes(cap: DeviceHandle<AppSelector>) {
    return {
      availableApplications: await cap.use((d) => d.getAvailableApplications()),
    };
  },
  async states(cap: DeviceHandle<AppSelector>) {
    return {
      currentApplication: await cap.use((d) => d.getCurrentApplication()),
    };
  },
};
