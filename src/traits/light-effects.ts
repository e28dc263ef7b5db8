/**
 * LightEffects: complex lighting commands such as looping through
 * colors.  Durations are in seconds and default to 1800 on the platform
 * side when not advertised.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export type LightEffectType = 'colorLoop' | 'sleep' | 'wake';

export interface LightEffects {
  getDefaultColorLoopDuration?(): Awaitable<number | undefined>;
  getDefaultSleepDuration?(): Awaitable<number | undefined>;
  getDefaultWakeDuration?(): Awaitable<number | undefined>;
  getSupportedEffects(): Awaitable<LightEffectType[]>;
  getActiveLightEffect(): Awaitable<LightEffectType | undefined>;
  /** When the active effect ends on its own. */
  getLightEffectEndUnixTimestampSec(): Awaitable<number | undefined>;
  setColorLoop(duration?: number): Awaitable<void>;
  setSleep(duration?: number): Awaitable<void>;
  setWake(duration?: number): Awaitable<void>;
  stopEffect(): Awaitable<void>;
}

export const lightEffectsTrait: TraitDefinition<LightEffects> = {
  async attributes(cap: DeviceHandle<LightEffects>) {
    return compact({
      defaultColorLoopDuration: await cap.use((d) => d.getDefaultColorLoopDuration?.()),
      defaultSleepDuration: await cap.use((d) => d.getDefaultSleepDuration?.()),
      defaultWakeDuration: await cap.use((d) => d.getDefaultWakeDuration?.()),
      supportedEffects: await cap.use((d) => d.getSupportedEffects()),
    });
  },
  async states(cap: DeviceHandle<LightEffects>) {
    return compact({
      activeLightEffect: await cap.use((d) => d.getActiveLightEffect()),
      lightEffectEndUnixTimestampSec: await cap.use((d) => d.getLightEffectEndUnixTimestampSec()),
    });
  },
};
