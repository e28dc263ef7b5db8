export {
  DeviceError,
  DeviceServerError,
  UnsupportedCapabilityError,
  classifyError,
  errorMessage,
} from './device-error';
export type {
  ExecuteError,
  GenericDeviceErrorCode,
  GenericDeviceExceptionCode,
  GenericErrorCode,
} from './device-error';
export { InvalidRequestError } from './invalid-request-error';
