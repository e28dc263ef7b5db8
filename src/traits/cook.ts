/**
 * Cook: devices that cook food according to food presets and cooking
 * modes.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable, SizeUnit, Synonym } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export const COOKING_MODES = [
  'NONE',
  'UNKNOWN_COOKING_MODE',
  'BAKE',
  'BEAT',
  'BLEND',
  'BOIL',
  'BREW',
  'BROIL',
  'CONVECTION_BAKE',
  'COOK',
  'DEFROST',
  'DEHYDRATE',
  'FERMENT',
  'FRY',
  'GRILL',
  'KNEAD',
  'MICROWAVE',
  'MIX',
  'PRESSURE_COOK',
  'PUREE',
  'ROAST',
  'SAUTE',
  'SLOW_COOK',
  'SOUS_VIDE',
  'STEAM',
  'STEW',
  'STIR',
  'WARM',
  'WHIP',
] as const;

export type CookingMode = (typeof COOKING_MODES)[number];

export interface FoodPreset {
  /** Internal name used in commands and states, shared across languages. */
  food_preset_name: string;
  supported_units: SizeUnit[];
  food_synonyms: Synonym[];
}

export type CookErrorCode =
  | 'deviceDoorOpen'
  | 'deviceLidOpen'
  | 'fractionalAmountNotSupported'
  | 'amountAboveLimit'
  | 'unknownFoodPreset'
  | GenericErrorCode;

export interface CookingConfig {
  cookingMode?: CookingMode;
  foodPreset?: string;
  quantity?: number;
  unit?: SizeUnit;
}

export interface Cook {
  getSupportedCookingModes(): Awaitable<CookingMode[]>;
  getFoodPresets(): Awaitable<FoodPreset[]>;
  /** `NONE` when no mode is selected. */
  getCurrentCookingMode(): Awaitable<CookingMode>;
  getCurrentFoodPreset(): Awaitable<string | undefined>;
  getCurrentFoodQuantity(): Awaitable<number | undefined>;
  getCurrentFoodUnit(): Awaitable<SizeUnit | undefined>;
  start(config: CookingConfig): Awaitable<void>;
  stop(): Awaitable<void>;
}

export const cookTrait: TraitDefinition<Cook> = {
  async attributes(cap: DeviceHandle<Cook>) {
    return {
      supportedCookingModes: await cap.use((d) => d.getSupportedCookingModes()),
      foodPresets: await cap.use((d) => d.getFoodPresets()),
    };
  },
  async states(cap: DeviceHandle<Cook>) {
    return compact({
      currentCookingMode: await cap.use((d) => d.getCurrentCookingMode()),
      currentFoodPreset: await cap.use((d) => d.getCurrentFoodPreset()),
      currentFoodQuantity: await cap.use((d) => d.getCurrentFoodQuantity()),
      currentFoodUnit: await cap.use((d) => d.getCurrentFoodUnit()),
    });
  },
};
