import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable, Language } from './common';
import type { TraitDefinition } from './trait-definition';

export interface CurrentRunCycle {
  currentCycle: string;
  nextCycle?: string;
  lang: Language;
}

/** Devices with a queryable ongoing operation, such as washers and dishwashers. */
export interface RunCycle {
  getCurrentRunCycle(): Awaitable<CurrentRunCycle[]>;
  /** Seconds left on the whole operation. */
  getCurrentTotalRemainingTime(): Awaitable<number>;
  /** Seconds left on the current cycle. */
  getCurrentCycleRemainingTime(): Awaitable<number>;
}

export const runCycleTrait: TraitDefinition<RunCycle> = {
  async states(cap: DeviceHandle<RunCycle>) {
    return {
      currentRunCycle: await cap.use((d) => d.getCurrentRunCycle()),
      currentTotalRemainingTime: await cap.use((d) => d.getCurrentTotalRemainingTime()),
      currentCycleRemainingTime: await cap.use((d) => d.getCurrentCycleRemainingTime()),
    };
  },
};
