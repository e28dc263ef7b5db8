/**
 * Fill: devices that can be filled, such as a bathtub.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, Language } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface FillLevel {
  level_name: string;
  level_values: Array<{
    /** The first synonym is the canonical name of the level. */
    level_synonym: string[];
    lang: Language;
  }>;
}

export interface AvailableFillLevels {
  levels: FillLevel[];
  ordered: boolean;
  supportsFillPercent: boolean;
}

export interface Fill {
  getAvailableFillLevels(): Awaitable<AvailableFillLevels>;
  /** False only when the device is completely drained. */
  isFilled(): Awaitable<boolean>;
  getCurrentFillLevel(): Awaitable<string | undefined>;
  getCurrentFillPercent(): Awaitable<number | undefined>;
  /** True to fill, false to drain. */
  fill(fill: boolean): Awaitable<void>;
  fillToLevel(level: string): Awaitable<void>;
  fillToPercent(percent: number): Awaitable<void>;
}

export const fillTrait: TraitDefinition<Fill> = {
  async attributes(cap: DeviceHandle<Fill>) {
    return {
      availableFillLevels: await cap.use((d) => d.getAvailableFillLevels()),
    };
  },
  async states(cap: DeviceHandle<Fill>) {
    return compact({
      isFilled: await cap.use((d) => d.isFilled()),
      currentFillLevel: await cap.use((d) => d.getCurrentFillLevel()),
      currentFillPercent: await cap.use((d) => d.getCurrentFillPercent()),
    });
  },
};
