/**
 * Error taxonomy for fulfillment.
 *
 * Capability implementations signal an expected, named failure by
 * throwing a `DeviceError` whose `code` is reported verbatim to the
 * caller.  Anything else a capability throws is an infrastructure
 * failure: it is reported as OFFLINE and only its message is kept, as a
 * local debug string.
 *
 * Calling a command against a device that never registered the trait it
 * needs is a contract violation in the integration and raises
 * `UnsupportedCapabilityError`, which is never folded into a result.
 */

// ---------------------------------------------------------------------------
// Shared error vocabulary
// ---------------------------------------------------------------------------

/** Device errors shared across capabilities. */
export type GenericDeviceErrorCode =
  | 'actionNotAvailable'
  | 'alreadyInState'
  | 'deviceBusy'
  | 'deviceNotReady'
  | 'deviceOffline'
  | 'deviceTurnedOff'
  | 'functionNotSupported'
  | 'hardError'
  | 'inSoftwareUpdate'
  | 'lowBattery'
  | 'maxSettingReached'
  | 'minSettingReached'
  | 'notSupported'
  | 'protocolError'
  | 'safetyShutOff'
  | 'transientError'
  | 'unknownError'
  | 'valueOutOfRange';

/** Device exceptions shared across capabilities. */
export type GenericDeviceExceptionCode =
  | 'deviceAtExtremeTemperature'
  | 'deviceMoved'
  | 'deviceOpen'
  | 'deviceTampered'
  | 'deviceUnplugged'
  | 'hardwareFailure'
  | 'isBypassed'
  | 'lowBattery'
  | 'needsSoftwareUpdate'
  | 'needsWater'
  | 'tankEmpty'
  | 'unableToLocateDevice';

export type GenericErrorCode = GenericDeviceErrorCode | GenericDeviceExceptionCode;

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/**
 * A serializable, protocol-defined failure.  Capability modules export the
 * codes they define, e.g. `new DeviceError<LockUnlockErrorCode>('alreadyLocked')`.
 */
export class DeviceError<C extends string = string> extends Error {
  readonly code: C;

  constructor(code: C, message?: string) {
    super(message ?? code);
    this.name = 'DeviceError';
    this.code = code;
  }
}

/** An infrastructure fault inside a device driver (I/O, unreachable hardware). */
export class DeviceServerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceServerError';
  }
}

/** A command targeted a trait the device never registered. */
export class UnsupportedCapabilityError extends Error {
  readonly deviceId: string;
  readonly trait: string;

  constructor(deviceId: string, trait: string) {
    super(`Device ${deviceId} does not support the ${trait} trait`);
    this.name = 'UnsupportedCapabilityError';
    this.deviceId = deviceId;
    this.trait = trait;
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export type ExecuteError =
  | { kind: 'serializable'; code: string }
  | { kind: 'server'; message: string };

/**
 * Fold a thrown value into the two-level taxonomy.  Contract violations
 * are rethrown.
 */
export function classifyError(err: unknown): ExecuteError {
  if (err instanceof UnsupportedCapabilityError) {
    throw err;
  }
  if (err instanceof DeviceError) {
    return { kind: 'serializable', code: err.code };
  }
  return { kind: 'server', message: errorMessage(err) };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
