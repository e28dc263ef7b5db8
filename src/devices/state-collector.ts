/**
 * SYNC and QUERY collectors.
 *
 * Both walk only the populated capability slots, in registration order,
 * and merge each trait's fragment into one flat object.
 */

import { classifyError } from '../errors';
import type { ExecuteError } from '../errors';
import { TRAIT_DEFINITIONS, traitTag } from '../traits';
import type { StateFragment, TraitName } from '../traits';
import type { QueryDeviceState, SyncDevice } from '../types/fulfillment';
import type { Device } from './device';
import { deviceTypeTag } from './device-type';

async function attributesOf<K extends TraitName>(device: Device, name: K): Promise<StateFragment> {
  const definition = TRAIT_DEFINITIONS[name];
  return definition.attributes ? definition.attributes(device.capability(name)) : {};
}

async function statesOf<K extends TraitName>(device: Device, name: K): Promise<StateFragment> {
  const definition = TRAIT_DEFINITIONS[name];
  return definition.states ? definition.states(device.capability(name)) : {};
}

/**
 * Describe a device for SYNC.  Runs whether or not the device is online;
 * any failure propagates so the caller can fail the whole response.
 */
export async function collectSync(device: Device): Promise<SyncDevice> {
  const identity = await device.identity();

  const attributes: StateFragment = {};
  for (const name of device.traits) {
    Object.assign(attributes, await attributesOf(device, name));
  }

  return {
    id: device.id,
    type: deviceTypeTag(device.type),
    traits: device.traits.map(traitTag),
    name: {
      name: identity.name.name,
      defaultNames: identity.name.defaultNames,
      nicknames: identity.name.nicknames,
    },
    willReportState: identity.willReportState,
    ...(identity.roomHint !== undefined ? { roomHint: identity.roomHint } : {}),
    deviceInfo: identity.info,
    attributes,
  };
}

/**
 * Report a device's current state for QUERY.
 *
 * Every state getter runs first.  A failing getter turns the whole answer
 * into ERROR with no partial state, carrying whatever online flag the
 * device reports.  Otherwise an offline device answers OFFLINE and an
 * online one SUCCESS with the merged state.  `on` defaults to true, as
 * the protocol requires it for every device; a registered OnOff trait
 * overrides it.
 */
export async function collectQuery(device: Device): Promise<QueryDeviceState> {
  const states: StateFragment = {};
  let failure: ExecuteError | undefined;
  try {
    for (const name of device.traits) {
      Object.assign(states, await statesOf(device, name));
    }
  } catch (err) {
    failure = classifyError(err);
  }

  // an online flag that cannot be read is reported as offline
  let online = false;
  try {
    online = await device.isOnline();
  } catch (err) {
    failure ??= classifyError(err);
  }

  if (failure) {
    return {
      status: 'ERROR',
      online,
      on: false,
      errorCode: failure.kind === 'serializable' ? failure.code : failure.message,
    };
  }
  if (!online) {
    return { status: 'OFFLINE', online: false, on: true };
  }
  return { status: 'SUCCESS', online: true, on: true, ...states };
}
