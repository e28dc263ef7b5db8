/**
 * Brightness: absolute brightness in a normalized range from 0 to 100.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

export interface Brightness {
  /** True when the device cannot answer QUERY for this trait. */
  isCommandOnlyBrightness(): Awaitable<boolean>;
  getBrightness(): Awaitable<number>;
  setBrightnessAbsolute(brightness: number): Awaitable<void>;
  setBrightnessRelativePercent(percent: number): Awaitable<void>;
  /** Ambiguous amount of change, scaled to -5..5. */
  setBrightnessRelativeWeight(weight: number): Awaitable<void>;
}

export const brightnessTrait: TraitDefinition<Brightness> = {
  async attributes(cap: DeviceHandle<Brightness>) {
    return {
      commandOnlyBrightness: await cap.use((d) => d.isCommandOnlyBrightness()),
    };
  },
  async states(cap: DeviceHandle<Brightness>) {
    return {
      brightness: await cap.use((d) => d.getBrightness()),
    };
  },
};
