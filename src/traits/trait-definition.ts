/**
 * How a trait contributes to SYNC and QUERY.
 *
 * `attributes` and `states` read the capability through its handle, one
 * acquisition per getter, and return a flat fragment keyed by the
 * protocol's field names.  Fields whose getter is absent or returns
 * `undefined` are left out.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { StateFragment } from './common';

export interface TraitDefinition<C> {
  attributes?(capability: DeviceHandle<C>): Promise<StateFragment>;
  states?(capability: DeviceHandle<C>): Promise<StateFragment>;
}

/** Drop fields whose value is `undefined`. */
export function compact(fields: Record<string, unknown>): StateFragment {
  const out: StateFragment = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
