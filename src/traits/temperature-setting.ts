/**
 * TemperatureSetting: thermostat setpoints and modes.
 *
 * QUERY reports either a single setpoint or, in heatcool mode, a
 * high/low range; both are flattened into the device state alongside
 * the other fields.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, TemperatureRange, TemperatureUnit } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export const THERMOSTAT_MODES = [
  'none',
  'off',
  'heat',
  'cool',
  'on',
  'heatcool',
  'auto',
  'fan-only',
  'purifier',
  'eco',
  'dry',
] as const;

/** `on` restores the previous mode and never appears in mode selection. */
export type ThermostatMode = (typeof THERMOSTAT_MODES)[number];

export interface ThermostatFixedSetpoint {
  thermostatMode: ThermostatMode;
  thermostatTemperatureAmbient: number;
  thermostatTemperatureSetpoint: number;
}

export interface ThermostatSetpointRange {
  thermostatMode: ThermostatMode;
  thermostatTemperatureAmbient: number;
  thermostatTemperatureSetpointHigh: number;
  thermostatTemperatureSetpointLow: number;
}

export type ThermostatState = ThermostatFixedSetpoint | ThermostatSetpointRange;

export interface TemperatureSetting {
  getAvailableThermostatModes(): Awaitable<ThermostatMode[]>;
  getThermostatTemperatureRange?(): Awaitable<TemperatureRange | undefined>;
  getThermostatTemperatureUnit(): Awaitable<TemperatureUnit>;
  /** Minimum offset between heatcool setpoints.  Defaults to 2. */
  getBufferRangeCelsius?(): Awaitable<number | undefined>;
  isCommandOnlyTemperatureSetting?(): Awaitable<boolean | undefined>;
  isQueryOnlyTemperatureSetting?(): Awaitable<boolean | undefined>;
  /** `none` when no mode is active. */
  getActiveThermostatMode(): Awaitable<ThermostatMode>;
  getTargetTempReachedEstimateUnixTimestampSec?(): Awaitable<number | undefined>;
  getThermostatHumidityAmbient?(): Awaitable<number | undefined>;
  getThermostatState(): Awaitable<ThermostatState>;
  setTemperatureSetpoint(setpoint: number): Awaitable<void>;
  /** Requires heatcool support. */
  setTemperatureSetRange(setpointHigh: number, setpointLow: number): Awaitable<void>;
  setThermostatMode(mode: ThermostatMode): Awaitable<void>;
  setTemperatureRelativeDegree(relativeDegrees: number): Awaitable<void>;
  setTemperatureRelativeWeight(weight: number): Awaitable<void>;
}

export const temperatureSettingTrait: TraitDefinition<TemperatureSetting> = {
  async attributes(cap: DeviceHandle<TemperatureSetting>) {
    return compact({
      availableThermostatModes: await cap.use((d) => d.getAvailableThermostatModes()),
      thermostatTemperatureRange: await cap.use((d) => d.getThermostatTemperatureRange?.()),
      thermostatTemperatureUnit: await cap.use((d) => d.getThermostatTemperatureUnit()),
      bufferRangeCelsius: await cap.use((d) => d.getBufferRangeCelsius?.()),
      commandOnlyTemperatureSetting: await cap.use((d) => d.isCommandOnlyTemperatureSetting?.()),
      queryOnlyTemperatureSetting: await cap.use((d) => d.isQueryOnlyTemperatureSetting?.()),
    });
  },
  async states(cap: DeviceHandle<TemperatureSetting>) {
    return compact({
      activeThermostatMode: await cap.use((d) => d.getActiveThermostatMode()),
      targetTempReachedEstimateUnixTimestampSec: await cap.use((d) =>
        d.getTargetTempReachedEstimateUnixTimestampSec?.(),
      ),
      thermostatHumidityAmbient: await cap.use((d) => d.getThermostatHumidityAmbient?.()),
      ...(await cap.use((d) => d.getThermostatState())),
    });
  },
};
