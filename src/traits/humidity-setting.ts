/**
 * HumiditySetting: humidifiers, dehumidifiers and other devices with a
 * humidity setpoint.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface HumiditySetpointRange {
  /** Defaults to 0. */
  minPercent?: number;
  /** Defaults to 100. */
  maxPercent?: number;
}

export interface HumiditySetting {
  getHumiditySetpointRange?(): Awaitable<HumiditySetpointRange | undefined>;
  isCommandOnlyHumiditySetting?(): Awaitable<boolean | undefined>;
  isQueryOnlyHumiditySetting?(): Awaitable<boolean | undefined>;
  /** Must fall within the setpoint range. */
  getHumiditySetpointPercent(): Awaitable<number>;
  getHumidityAmbientPercent(): Awaitable<number>;
  setHumidity(humidity: number): Awaitable<void>;
  setHumidityRelativePercent(percent: number): Awaitable<void>;
  setHumidityRelativeWeight(weight: number): Awaitable<void>;
}

export const humiditySettingTrait: TraitDefinition<HumiditySetting> = {
  async attributes(cap: DeviceHandle<HumiditySetting>) {
    return compact({
      humiditySetpointRange: await cap.use((d) => d.getHumiditySetpointRange?.()),
      commandOnlyHumiditySetting: await cap.use((d) => d.isCommandOnlyHumiditySetting?.()),
      queryOnlyHumiditySetting: await cap.use((d) => d.isQueryOnlyHumiditySetting?.()),
    });
  },
  async states(cap: DeviceHandle<HumiditySetting>) {
    return {
      humiditySetpointPercent: await cap.use((d) => d.getHumiditySetpointPercent()),
      humidityAmbientPercent: await cap.use((d) => d.getHumidityAmbientPercent()),
    };
  },
};
