/**
 * Channel: TV channels on a media device.  Keep the advertised channel
 * list small (30 channels or fewer) to keep QUERY latency low.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface AvailableChannel {
  /** Unique identifier, never exposed to users. */
  key: string;
  names: string[];
  number?: string;
}

export interface Channel {
  getAvailableChannels(): Awaitable<AvailableChannel[]>;
  isCommandOnlyChannels?(): Awaitable<boolean | undefined>;
  selectChannelById(code: string, name?: string, number?: string): Awaitable<void>;
  selectChannelByNumber(number: string): Awaitable<void>;
  /** Move up or down by `change` channels. */
  selectChannelRelative(change: number): Awaitable<void>;
  returnToLastChannel(): Awaitable<void>;
}

export const channelTrait: TraitDefinition<Channel> = {
  async attributes(cap: DeviceHandle<Channel>) {
    return compact({
      availableChannels: await cap.use((d) => d.getAvailableChannels()),
      commandOnlyChannels: await cap.use((d) => d.isCommandOnlyChannels?.()),
    });
  },
};
