/**
 * Rotation: devices that rotate, such as blinds with rotatable slats.
 * Degrees are always measured clockwise.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface RotationDegreesRange {
  rotationDegreesMin: number;
  rotationDegreesMax: number;
}

export interface Rotation {
  supportsDegrees(): Awaitable<boolean>;
  supportsPercent(): Awaitable<boolean>;
  getRotationDegreesRange(): Awaitable<RotationDegreesRange>;
  /** Relative rotations wrap around the range. */
  supportsContinuousRotation?(): Awaitable<boolean | undefined>;
  isCommandOnlyRotation?(): Awaitable<boolean | undefined>;
  getRotationDegrees(): Awaitable<number>;
  /** 0 is closed, 100 is open. */
  getRotationPercent(): Awaitable<number>;
  setRotationDegrees(degrees: number): Awaitable<void>;
  setRotationPercent(percent: number): Awaitable<void>;
}

export const rotationTrait: TraitDefinition<Rotation> = {
  async attributes(cap: DeviceHandle<Rotation>) {
    return compact({
      supportsDegrees: await cap.use((d) => d.supportsDegrees()),
      supportsPercent: await cap.use((d) => d.supportsPercent()),
      rotationDegreesRange: await cap.use((d) => d.getRotationDegreesRange()),
      supportsContinuousRotation: await cap.use((d) => d.supportsContinuousRotation?.()),
      commandOnlyRotation: await cap.use((d) => d.isCommandOnlyRotation?.()),
    });
  },
  async states(cap: DeviceHandle<Rotation>) {
    return {
      rotationDegrees: await cap.use((d) => d.getRotationDegrees()),
      rotationPercent: await cap.use((d) => d.getRotationPercent()),
    };
  },
};
