import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export type ActivityState = 'INACTIVE' | 'STANDBY' | 'ACTIVE';

export type PlaybackState =
  | 'PAUSED'
  | 'PLAYING'
  | 'FAST_FORWARDING'
  | 'REWINDING'
  | 'BUFFERING'
  | 'STOPPED';

/** Devices that report media activity and playback states. */
export interface MediaState {
  supportsActivityState?(): Awaitable<boolean | undefined>;
  supportsPlaybackState?(): Awaitable<boolean | undefined>;
  getActivityState(): Awaitable<ActivityState | undefined>;
  getPlaybackState(): Awaitable<PlaybackState | undefined>;
}

export const mediaStateTrait: TraitDefinition<MediaState> = {
  async attributes(cap: DeviceHandle<MediaState>) {
    return compact({
      supportActivityState: await cap.use((d) => d.supportsActivityState?.()),
      supportPlaybackState: await cap.use((d) => d.supportsPlaybackState?.()),
    });
  },
  async states(cap: DeviceHandle<MediaState>) {
    return compact({
      activityState: await cap.use((d) => d.getActivityState()),
      playbackState: await cap.use((d) => d.getPlaybackState()),
    });
  },
};
