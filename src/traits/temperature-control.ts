/**
 * TemperatureControl: devices other than thermostats that control a
 * temperature within or around themselves, such as ovens and
 * refrigerators.  Thermostat-style control is TemperatureSetting.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, TemperatureRange, TemperatureUnit } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface TemperatureControl {
  getTemperatureRange(): Awaitable<TemperatureRange>;
  /** Minimum adjustment interval.  Without it steps are a share of the range. */
  getTemperatureStepCelsius?(): Awaitable<number | undefined>;
  getTemperatureUnitForUx(): Awaitable<TemperatureUnit>;
  isCommandOnlyTemperatureControl?(): Awaitable<boolean | undefined>;
  isQueryOnlyTemperatureControl?(): Awaitable<boolean | undefined>;
  getTemperatureSetpointCelsius(): Awaitable<number>;
  getTemperatureAmbientCelsius(): Awaitable<number>;
  setTemperature(temperature: number): Awaitable<void>;
}

export const temperatureControlTrait: TraitDefinition<TemperatureControl> = {
  async attributes(cap: DeviceHandle<TemperatureControl>) {
    return compact({
      temperatureRange: await cap.use((d) => d.getTemperatureRange()),
      temperatureStepCelsius: await cap.use((d) => d.getTemperatureStepCelsius?.()),
      temperatureUnitForUX: await cap.use((d) => d.getTemperatureUnitForUx()),
      commandOnlyTemperatureControl: await cap.use((d) => d.isCommandOnlyTemperatureControl?.()),
      queryOnlyTemperatureControl: await cap.use((d) => d.isQueryOnlyTemperatureControl?.()),
    });
  },
  async states(cap: DeviceHandle<TemperatureControl>) {
    return {
      temperatureSetpointCelsius: await cap.use((d) => d.getTemperatureSetpointCelsius()),
      temperatureAmbientCelsius: await cap.use((d) => d.getTemperatureAmbientCelsius()),
    };
  },
};
