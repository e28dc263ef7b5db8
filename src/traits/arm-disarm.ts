/**
 * ArmDisarm: arming and disarming, as used in security systems.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable, Language } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

/** A security level. */
export interface ArmLevel {
  /** Internal name used in commands and states, shared across languages. */
  level_name: string;
  level_values: Array<{
    /** The first item is the canonical name. */
    level_synonym: string[];
    lang: Language;
  }>;
}

export type ArmDisarmErrorCode =
  | 'alreadyInState'
  | 'deviceTampered'
  | 'passphraseIncorrect'
  | 'pinIncorrect'
  | 'securityRestrictions'
  | 'tooManyFailedAttempts'
  | 'userCancelled'
  | GenericErrorCode;

export interface ArmDisarm {
  /** Supported security levels.  Without it the device supports one level. */
  getAvailableArmLevels(): Awaitable<ArmLevel[] | undefined>;
  /** Whether increase/decrease grammar applies in the order of the levels. */
  isOrdered(): Awaitable<boolean>;
  isArmed(): Awaitable<boolean>;
  currentArmLevel(): Awaitable<string>;
  /** Seconds the user has to leave before `currentArmLevel` takes effect. */
  exitAllowance(): Awaitable<number>;
  arm(arm: boolean): Awaitable<void>;
  cancelArm(): Awaitable<void>;
  armWithLevel(arm: boolean, level: string): Awaitable<void>;
}

export const armDisarmTrait: TraitDefinition<ArmDisarm> = {
  async attributes(cap: DeviceHandle<ArmDisarm>) {
    const levels = await cap.use((d) => d.getAvailableArmLevels());
    if (levels === undefined) return {};
    return {
      availableArmLevels: {
        levels,
        ordered: await cap.use((d) => d.isOrdered()),
      },
    };
  },
  async states(cap: DeviceHandle<ArmDisarm>) {
    return compact({
      isArmed: await cap.use((d) => d.isArmed()),
      currentArmLevel: await cap.use((d) => d.currentArmLevel()),
      exitAllowance: await cap.use((d) => d.exitAllowance()),
    });
  },
};
