/**
 * Timer: a built-in timer, as on a sprinkler controller or a smart
 * light switch.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

/** Reported as `timerRemainingSec` when no timer is running. */
export const NO_TIMER = -1;

export interface Timer {
  getMaxTimerLimitSec(): Awaitable<number>;
  isCommandOnlyTimer?(): Awaitable<boolean | undefined>;
  /** `undefined` or -1 when no timer is running. */
  getTimerRemainingSec(): Awaitable<number | undefined>;
  isTimerPaused?(): Awaitable<boolean | undefined>;
  /** `seconds` is within [1, maxTimerLimitSec]. */
  startTimer(seconds: number): Awaitable<void>;
  /** `seconds` is within [-maxTimerLimitSec, maxTimerLimitSec]. */
  adjustTimer(seconds: number): Awaitable<void>;
  pauseTimer(): Awaitable<void>;
  resumeTimer(): Awaitable<void>;
  cancelTimer(): Awaitable<void>;
}

export const timerTrait: TraitDefinition<Timer> = {
  async attributes(cap: DeviceHandle<Timer>) {
    return compact({
      maxTimerLimitSec: await cap.use((d) => d.getMaxTimerLimitSec()),
      commandOnlyTimer: await cap.use((d) => d.isCommandOnlyTimer?.()),
    });
  },
  async states(cap: DeviceHandle<Timer>) {
    return compact({
      timerRemainingSec: (await cap.use((d) => d.getTimerRemainingSec())) ?? NO_TIMER,
      timerPaused: await cap.use((d) => d.isTimerPaused?.()),
    });
  },
};
