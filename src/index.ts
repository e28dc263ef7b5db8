/**
 * smart-home-fulfillment
 *
 * Exposes local smart-home devices to a cloud smart-home platform:
 * - Device discovery (SYNC) and state polling (QUERY)
 * - Command dispatch (EXECUTE) across ~40 capability traits
 * - Account unlinking (DISCONNECT)
 */

// Main entry point
export { SmartHomeFulfillment, SYNC_FAILURE_CODE } from './fulfillment';
export type { SmartHomeFulfillmentOptions } from './fulfillment';
export { commandSchema, parseRequest, requestSchema } from './fulfillment';
export type { CommandName, DeviceCommand, FulfillmentInput, FulfillmentRequest } from './fulfillment';

// Devices
export {
  Device,
  DeviceController,
  DeviceHandle,
  DeviceRegistry,
  DEVICE_TYPES,
  deviceTypeTag,
} from './devices';
export type {
  DeviceIdentity,
  DeviceInfo,
  DeviceName,
  DeviceType,
  ExecuteOutcome,
  SmartHomeDevice,
} from './devices';

// Capability traits
export * from './traits';

// Errors
export {
  DeviceError,
  DeviceServerError,
  InvalidRequestError,
  UnsupportedCapabilityError,
  classifyError,
} from './errors';
export type {
  ExecuteError,
  GenericDeviceErrorCode,
  GenericDeviceExceptionCode,
  GenericErrorCode,
} from './errors';

export { loadConfig } from './config';
export type { FulfillmentConfig, LogLevel } from './config';
export { createLogger } from './logging';
export type { Logger } from './logging';

// Wire types
export { INTENTS } from './types/fulfillment';
export type {
  CommandResult,
  CommandStatus,
  DisconnectPayload,
  ExecutePayload,
  FulfillmentResponse,
  Intent,
  QueryDeviceState,
  QueryPayload,
  QueryStatus,
  ResponsePayload,
  SyncDevice,
  SyncPayload,
} from './types/fulfillment';
