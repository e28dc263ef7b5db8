/**
 * FanSpeed: devices that blow air at various levels, such as low,
 * medium and high.  A device advertises named speeds, percentage
 * control, or both.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable, Language } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface FanSpeedItem {
  speed_name: string;
  speed_values: Array<{
    /** The first synonym is the canonical name of the speed. */
    speed_synonym: string[];
    lang: Language;
  }>;
}

export interface AvailableFanSpeeds {
  speeds: FanSpeedItem[];
  /** Whether increase/decrease grammar applies in the order of `speeds`. */
  ordered: boolean;
}

export type FanSpeedErrorCode = 'maxSpeedReached' | 'minSpeedReached' | GenericErrorCode;

export interface FanSpeed {
  isReversible?(): Awaitable<boolean | undefined>;
  isCommandOnlyFanSpeed?(): Awaitable<boolean | undefined>;
  getAvailableFanSpeeds(): Awaitable<AvailableFanSpeeds | undefined>;
  supportsFanSpeedPercent(): Awaitable<boolean | undefined>;
  /** Required when named speeds are advertised. */
  getCurrentFanSpeedSetting(): Awaitable<string | undefined>;
  /** Required when percentage control is advertised. */
  getCurrentFanSpeedPercent(): Awaitable<number | undefined>;
  setFanSpeedSetting(name: string): Awaitable<void>;
  setFanSpeedPercent(percent: number): Awaitable<void>;
  setFanSpeedRelativeWeight(weight: number): Awaitable<void>;
  setFanSpeedRelativePercent(percent: number): Awaitable<void>;
  /** Only called for reversible devices. */
  setFanReverse(): Awaitable<void>;
}

export const fanSpeedTrait: TraitDefinition<FanSpeed> = {
  async attributes(cap: DeviceHandle<FanSpeed>) {
    return compact({
      reversible: await cap.use((d) => d.isReversible?.()),
      commandOnlyFanSpeed: await cap.use((d) => d.isCommandOnlyFanSpeed?.()),
      availableFanSpeeds: await cap.use((d) => d.getAvailableFanSpeeds()),
      supportsFanSpeedPercent: await cap.use((d) => d.supportsFanSpeedPercent()),
    });
  },
  async states(cap: DeviceHandle<FanSpeed>) {
    return compact({
      currentFanSpeedSetting: await cap.use((d) => d.getCurrentFanSpeedSetting()),
      currentFanSpeedPercent: await cap.use((d) => d.getCurrentFanSpeedPercent()),
    });
  },
};
