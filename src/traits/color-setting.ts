/**
 * ColorSetting: devices such as smart lights that can change color or
 * color temperature.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export type ColorModel = 'rgb' | 'hsv';

export interface ColorTemperatureRange {
  temperatureMinK: number;
  temperatureMaxK: number;
}

/** At least one of the two fields must be set. */
export interface ColorModelSupport {
  colorModel?: ColorModel;
  colorTemperatureRange?: ColorTemperatureRange;
}

export interface SpectrumHsv {
  hue: number;
  saturation: number;
  value: number;
}

export interface Color {
  temperatureK?: number;
  /** Spectrum value as a decimal RGB integer. */
  spectrumRgb?: number;
  spectrumHsv?: SpectrumHsv;
}

/** Color requested by the ColorAbsolute command. */
export type ColorCommand =
  | { temperature: number }
  | { spectrumRGB: number }
  | { spectrumHSV: SpectrumHsv };

export interface ColorSetting {
  isCommandOnlyColorSetting(): Awaitable<boolean>;
  getColorModelSupport(): Awaitable<ColorModelSupport>;
  getColor(): Awaitable<Color>;
  setColor(color: ColorCommand): Awaitable<void>;
}

export const colorSettingTrait: TraitDefinition<ColorSetting> = {
  async attributes(cap: DeviceHandle<ColorSetting>) {
    const support = await cap.use((d) => d.getColorModelSupport());
    return compact({
      commandOnlyColorSetting: await cap.use((d) => d.isCommandOnlyColorSetting()),
      colorModel: support.colorModel,
      colorTemperatureRange: support.colorTemperatureRange,
    });
  },
  async states(cap: DeviceHandle<ColorSetting>) {
    return {
      color: compact({ ...(await cap.use((d) => d.getColor())) }),
    };
  },
};
