/**
 * Types shared by several capability interfaces.
 *
 * Every capability method may answer synchronously or return a promise;
 * the dispatcher awaits either form.
 */

export type Awaitable<T> = T | Promise<T>;

/** Flat, wire-ready fragment of SYNC attributes, QUERY state or EXECUTE state. */
export type StateFragment = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const LANGUAGES = [
  'da', 'nl', 'en', 'fr', 'de', 'hi', 'id', 'it',
  'ja', 'ko', 'no', 'pt-BR', 'es', 'sv', 'th', 'zh-TW',
] as const;

export type Language = (typeof LANGUAGES)[number];

export const SIZE_UNITS = [
  'UNKNOWN_UNITS',
  'NO_UNITS',
  'CENTIMETERS',
  'CUPS',
  'DECILITERS',
  'FEET',
  'FLUID_OUNCES',
  'GALLONS',
  'GRAMS',
  'INCHES',
  'KILOGRAMS',
  'LITERS',
  'METERS',
  'MILLIGRAMS',
  'MILLILITERS',
  'MILLIMETERS',
  'OUNCES',
  'PINCH',
  'PINTS',
  'PORTION',
  'POUNDS',
  'QUARTS',
  'TABLESPOONS',
  'TEASPOONS',
] as const;

export type SizeUnit = (typeof SIZE_UNITS)[number];

/** Temperature unit used in responses to the user. */
export type TemperatureUnit = 'C' | 'F';

// ---------------------------------------------------------------------------
// Structures
// ---------------------------------------------------------------------------

/** Supported temperature range of the device, in degrees Celsius. */
export interface TemperatureRange {
  minThresholdCelsius: number;
  maxThresholdCelsius: number;
}

/** Name synonyms in one supported language. */
export interface Synonym {
  /** Should include both singular and plural forms, if applicable. */
  synonym: string[];
  lang: Language;
}

/** Synonyms for a named application, input, mode or toggle in one language. */
export interface NameSynonyms {
  name_synonym: string[];
  lang: Language;
}
