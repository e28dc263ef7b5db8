/**
 * Scene: a named, user-configured set of actions.  Each scene is its
 * own virtual device and maps 1:1 to this trait.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface Scene {
  /** Reversible scenes accept ActivateScene with `deactivate: true`. */
  isReversible?(): Awaitable<boolean | undefined>;
  activate(): Awaitable<void>;
  deactivate(): Awaitable<void>;
}

export const sceneTrait: TraitDefinition<Scene> = {
  async attributes(cap: DeviceHandle<Scene>) {
    return compact({
      sceneReversible: await cap.use((d) => d.isReversible?.()),
    });
  },
};
