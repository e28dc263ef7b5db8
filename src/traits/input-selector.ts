/**
 * InputSelector: devices that switch between named audio or video
 * inputs.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable, NameSynonyms } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface AvailableInput {
  /** Unique key, never exposed to users. */
  key: string;
  names: NameSynonyms[];
}

export type InputSelectorErrorCode = 'unsupportedInput' | GenericErrorCode;

export interface InputSelector {
  getAvailableInputs(): Awaitable<AvailableInput[]>;
  isCommandOnlyInputSelector?(): Awaitable<boolean | undefined>;
  /** Ordered inputs enable NextInput and PreviousInput. */
  hasOrderedInputs?(): Awaitable<boolean | undefined>;
  getCurrentInput(): Awaitable<string>;
  setInput(input: string): Awaitable<void>;
  setNextInput(): Awaitable<void>;
  setPreviousInput(): Awaitable<void>;
}

export const inputSelectorTrait: TraitDefinition<InputSelector> = {
  async attributes(cap: DeviceHandle<InputSelector>) {
    return compact({
      availableInputs: await cap.use((d) => d.getAvailableInputs()),
      commandOnlyInputSelector: await cap.use((d) => d.isCommandOnlyInputSelector?.()),
      orderedInputs: await cap.use((d) => d.hasOrderedInputs?.()),
    });
  },
  async states(cap: DeviceHandle<InputSelector>) {
    return {
      currentInput: await cap.use((d) => d.getCurrentInput()),
    };
  },
};
