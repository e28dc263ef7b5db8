/**
 * SensorState: quantitative measurements (air quality index, smoke
 * level) and qualitative states (healthy air, high smoke).  A sensor that
 * reports both is read numerically where possible.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

export interface SupportedSensorState {
  /** Sensor type, such as `AirQuality` or `SmokeLevel`. */
  name: string;
  descriptiveCapabilities?: {
    /** At least one state. `unknown` is implied. */
    availableStates: string[];
  };
  numericCapabilities?: {
    rawValueUnit: string;
  };
}

export interface CurrentSensorState {
  name: string;
  currentSensorState?: string;
  rawValue?: number;
}

export interface SensorState {
  getSupportedSensorStates(): Awaitable<SupportedSensorState[]>;
  getCurrentSensorStates(): Awaitable<CurrentSensorState[]>;
}

export const sensorStateTrait: TraitDefinition<SensorState> = {
  async attributes(cap: DeviceHandle<SensorState>) {
    return {
      sensorStatesSupported: await cap.use((d) => d.getSupportedSensorStates()),
    };
  },
  async states(cap: DeviceHandle<SensorState>) {
    return {
      currentSensorStateData: await cap.use((d) => d.getCurrentSensorStates()),
    };
  },
};
