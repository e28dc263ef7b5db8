/**
 * TransportControl: media playback control (pause, resume, skip).
 * Devices that also report playback state use MediaState for it.  Each
 * operation is only sent when its command is advertised.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

export type TransportControlCommand =
  | 'CAPTION_CONTROL'
  | 'NEXT'
  | 'PAUSE'
  | 'PREVIOUS'
  | 'RESUME'
  | 'SEEK_RELATIVE'
  | 'SEEK_ABSOLUTE'
  | 'SET_REPEAT'
  | 'SHUFFLE'
  | 'STOP';

export interface TransportControl {
  getSupportedControlCommands(): Awaitable<TransportControlCommand[]>;
  mediaStop(): Awaitable<void>;
  mediaNext(): Awaitable<void>;
  mediaPrevious(): Awaitable<void>;
  mediaPause(): Awaitable<void>;
  mediaResume(): Awaitable<void>;
  /** Positive seeks forward, negative backward. */
  mediaSeekRelative(relativePositionMs: number): Awaitable<void>;
  mediaSeekToPosition(absPositionMs: number): Awaitable<void>;
  /** `isSingle` repeats the current item rather than the playlist. */
  mediaRepeatMode(isOn: boolean, isSingle: boolean): Awaitable<void>;
  mediaShuffle(): Awaitable<void>;
  mediaClosedCaptioningOn(closedCaptioningLanguage: string, userQueryLanguage: string): Awaitable<void>;
  mediaClosedCaptioningOff(): Awaitable<void>;
}

export const transportControlTrait: TraitDefinition<TransportControl> = {
  async attributes(cap: DeviceHandle<TransportControl>) {
    return {
      transportControlSupportedCommands: await cap.use((d) => d.getSupportedControlCommands()),
    };
  },
};
