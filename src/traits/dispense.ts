/**
 * Dispense: devices that dispense a specified amount of one or more
 * physical items, such as a pet feeder or a faucet.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable, Language, SizeUnit } from './common';
import type { TraitDefinition } from './trait-definition';

export interface DispenseAmount {
  amount: number;
  unit: SizeUnit;
}

export interface DispenseSynonyms {
  synonyms: string[];
  lang: Language;
}

export interface DispenseItem {
  /** Internal name, shared across languages. */
  item_name: string;
  item_name_synonyms: DispenseSynonyms[];
  supported_units: SizeUnit[];
  /** Typical amount dispensed. */
  default_portion: DispenseAmount;
}

export interface DispensePreset {
  preset_name: string;
  preset_name_synonyms: DispenseSynonyms[];
}

export interface DispenseItemState {
  itemName: string;
  amountRemaining: DispenseAmount;
  amountLastDispensed: DispenseAmount;
  isCurrentlyDispensing: boolean;
}

export type DispenseErrorCode =
  | 'dispenseAmountRemainingExceeded'
  | 'dispenseAmountAboveLimit'
  | 'dispenseAmountBelowLimit'
  | 'dispenseFractionalAmountNotSupported'
  | 'genericDispenseNotSupported'
  | 'dispenseNotSupported'
  | 'dispenseFractionalUnitNotSupported'
  | 'deviceCurrentlyDispensing'
  | 'deviceClogged'
  | 'deviceBusy'
  | GenericErrorCode;

export type DispenseExceptionCode = 'amountRemainingLow' | 'userNeedsToWait';

export interface Dispense {
  getSupportedDispenseItems(): Awaitable<DispenseItem[]>;
  getSupportedDispensePresets(): Awaitable<DispensePreset[]>;
  getDispenseItemsState(): Awaitable<DispenseItemState[]>;
  dispenseAmount(item: string, amount: number, unit: SizeUnit): Awaitable<void>;
  dispensePreset(preset: string): Awaitable<void>;
  /** Dispense without an item or preset. */
  dispenseDefault(): Awaitable<void>;
}

export const dispenseTrait: TraitDefinition<Dispense> = {
  async attributes(cap: DeviceHandle<Dispense>) {
    return {
      supportedDispenseItems: await cap.use((d) => d.getSupportedDispenseItems()),
      supportedDispensePresets: await cap.use((d) => d.getSupportedDispensePresets()),
    };
  },
  async states(cap: DeviceHandle<Dispense>) {
    return {
      dispenseItems: await cap.use((d) => d.getDispenseItemsState()),
    };
  },
};
