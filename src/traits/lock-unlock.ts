/**
 * LockUnlock: devices that lock and unlock, or report a locked state.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

export type LockUnlockErrorCode =
  | 'remoteSetDisabled'
  | 'deviceJammingDetected'
  | 'notSupported'
  | 'alreadyLocked'
  | 'alreadyUnlocked'
  | GenericErrorCode;

export interface LockUnlock {
  isLocked(): Awaitable<boolean>;
  /** A jammed device cannot determine its locked state. */
  isJammed(): Awaitable<boolean>;
  setLocked(lock: boolean): Awaitable<void>;
}

export const lockUnlockTrait: TraitDefinition<LockUnlock> = {
  async states(cap: DeviceHandle<LockUnlock>) {
    return {
      isLocked: await cap.use((d) => d.isLocked()),
      isJammed: await cap.use((d) => d.isJammed()),
    };
  },
};
