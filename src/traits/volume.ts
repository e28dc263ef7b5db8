/**
 * Volume: setting the volume level, muting and unmuting.  Muting keeps
 * the remembered level: a muted device at volume 5 still reports 5.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface Volume {
  /** Maximum level, with 0 as mute. */
  getVolumeMaxLevel(): Awaitable<number>;
  canMuteAndUnmute(): Awaitable<boolean>;
  /** Defaults to 40. */
  getVolumeDefaultPercentage?(): Awaitable<number | undefined>;
  /** Defaults to 1. */
  getLevelStepSize?(): Awaitable<number | undefined>;
  isCommandOnlyVolume?(): Awaitable<boolean | undefined>;
  getCurrentVolume(): Awaitable<number | undefined>;
  /** Required when the device can mute. */
  isMuted(): Awaitable<boolean | undefined>;
  mute(mute: boolean): Awaitable<void>;
  setVolume(volumeLevel: number): Awaitable<void>;
  setVolumeRelative(relativeSteps: number): Awaitable<void>;
}

export const volumeTrait: TraitDefinition<Volume> = {
  async attributes(cap: DeviceHandle<Volume>) {
    return compact({
      volumeMaxLevel: await cap.use((d) => d.getVolumeMaxLevel()),
      volumeCanMuteAndUnmute: await cap.use((d) => d.canMuteAndUnmute()),
      volumeDefaultPercentage: await cap.use((d) => d.getVolumeDefaultPercentage?.()),
      levelStepSize: await cap.use((d) => d.getLevelStepSize?.()),
      commandOnlyVolume: await cap.use((d) => d.isCommandOnlyVolume?.()),
    });
  },
  async states(cap: DeviceHandle<Volume>) {
    return compact({
      currentVolume: await cap.use((d) => d.getCurrentVolume()),
      isMuted: await cap.use((d) => d.isMuted()),
    });
  },
};
