export { Device } from './device';
export type { DeviceIdentity } from './device';
export { DeviceHandle } from './device-handle';
export { DeviceController } from './device-controller';
export type { ExecuteOutcome } from './device-controller';
export { DeviceRegistry } from './device-registry';
export { DEVICE_TYPES, deviceTypeTag } from './device-type';
export type { DeviceType } from './device-type';
export type { DeviceInfo, DeviceName, SmartHomeDevice } from './smart-home-device';
export { collectQuery, collectSync } from './state-collector';
