/**
 * EnergyStorage: devices that store energy in a battery and may
 * recharge, or that charge another device.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export type UxDistanceUnit = 'KILOMETERS' | 'MILES';

export type CapacityState = 'CRITICALLY_LOW' | 'LOW' | 'MEDIUM' | 'HIGH' | 'FULL';

export type CapacityUnit = 'SECONDS' | 'MILES' | 'KILOMETERS' | 'PERCENTAGE' | 'KILOWATT_HOURS';

export interface CapacityValue {
  rawValue: number;
  unit: CapacityUnit;
}

export type EnergyStorageErrorCode = 'deviceUnplugged' | GenericErrorCode;

export interface EnergyStorage {
  /** True when charging cannot be started or stopped. */
  isQueryOnly(): Awaitable<boolean>;
  getDistanceUnitForUx(): Awaitable<UxDistanceUnit>;
  isRechargeable(): Awaitable<boolean>;
  getDescriptiveCapacityRemaining(): Awaitable<CapacityState>;
  getCapacityRemaining?(): Awaitable<CapacityValue[] | undefined>;
  getCapacityUntilFull?(): Awaitable<CapacityValue[] | undefined>;
  isCharging?(): Awaitable<boolean | undefined>;
  /** A device can be plugged in without actively charging. */
  isPluggedIn?(): Awaitable<boolean | undefined>;
  /** Never called for a device that is not rechargeable. */
  charge(charge: boolean): Awaitable<void>;
}

export const energyStorageTrait: TraitDefinition<EnergyStorage> = {
  async attributes(cap: DeviceHandle<EnergyStorage>) {
    return {
      queryOnlyEnergyStorage: await cap.use((d) => d.isQueryOnly()),
      energyStorageDistanceUnitForUX: await cap.use((d) => d.getDistanceUnitForUx()),
      isRechargeable: await cap.use((d) => d.isRechargeable()),
    };
  },
  async states(cap: DeviceHandle<EnergyStorage>) {
    return compact({
      descriptiveCapacityRemaining: await cap.use((d) => d.getDescriptiveCapacityRemaining()),
      capacityRemaining: await cap.use((d) => d.getCapacityRemaining?.()),
      capacityUntilFull: await cap.use((d) => d.getCapacityUntilFull?.()),
      isCharging: await cap.use((d) => d.isCharging?.()),
      isPluggedIn: await cap.use((d) => d.isPluggedIn?.()),
    });
  },
};
