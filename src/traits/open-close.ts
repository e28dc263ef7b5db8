/**
 * OpenClose: devices that open and close, possibly partially or in
 * more than one direction (blinds that open left or right).
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export const OPEN_DIRECTIONS = ['UP', 'DOWN', 'LEFT', 'RIGHT', 'IN', 'OUT'] as const;

export type OpenDirection = (typeof OPEN_DIRECTIONS)[number];

export interface OpenState {
  /** 0 is closed, 100 is fully open. */
  openPercent: number;
  openDirection: OpenDirection;
}

export type OpenCloseErrorCode = 'lockedState' | 'deviceJammingDetected' | GenericErrorCode;

export interface OpenClose {
  /** Fully open or fully closed only. */
  isDiscreteOnlyOpenClose?(): Awaitable<boolean | undefined>;
  /** Only for devices that open in more than one direction. */
  getSupportedOpeningDirections?(): Awaitable<OpenDirection[] | undefined>;
  isCommandOnlyOpenClose?(): Awaitable<boolean | undefined>;
  isQueryOnlyOpenClose?(): Awaitable<boolean | undefined>;
  /** Reported for single-direction devices. */
  getOpenPercent(): Awaitable<number | undefined>;
  /** Reported for multi-direction devices, one entry per direction. */
  getOpenState(): Awaitable<OpenState[] | undefined>;
  setOpen(percent: number, direction?: OpenDirection): Awaitable<void>;
  setOpenRelative(relativePercent: number, direction?: OpenDirection): Awaitable<void>;
}

export const openCloseTrait: TraitDefinition<OpenClose> = {
  async attributes(cap: DeviceHandle<OpenClose>) {
    return compact({
      discreteOnlyOpenClose: await cap.use((d) => d.isDiscreteOnlyOpenClose?.()),
      openDirection: await cap.use((d) => d.getSupportedOpeningDirections?.()),
      commandOnlyOpenClose: await cap.use((d) => d.isCommandOnlyOpenClose?.()),
      queryOnlyOpenClose: await cap.use((d) => d.isQueryOnlyOpenClose?.()),
    });
  },
  async states(cap: DeviceHandle<OpenClose>) {
    return compact({
      openPercent: await cap.use((d) => d.getOpenPercent()),
      openState: await cap.use((d) => d.getOpenState()),
    });
  },
};
