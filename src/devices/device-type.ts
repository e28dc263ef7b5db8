/**
 * Device types advertised in SYNC.  Each maps to a namespaced type
 * string, e.g. `SECURITYSYSTEM` -> `action.devices.types.SECURITYSYSTEM`.
 */

export const DEVICE_TYPES = [
  'AC_UNIT', 'AIRCOOLER', 'AIRFRESHENER', 'AIRPURIFIER', 'AUDIO_VIDEO_RECEIVER',
  'AWNING', 'BATHTUB', 'BED', 'BLENDER', 'BLINDS', 'BOILER', 'CAMERA',
  'CARBON_MONOXIDE_DETECTOR', 'CHARGER', 'CLOSET', 'COFFEE_MAKER', 'COOKTOP',
  'CURTAIN', 'DEHUMIDIFIER', 'DEHYDRATOR', 'DISHWASHER', 'DOOR', 'DOORBELL',
  'DRAWER', 'DRYER', 'FAN', 'FAUCET', 'FIREPLACE', 'FREEZER', 'FRYER', 'GARAGE',
  'GATE', 'GRILL', 'HEATER', 'HOOD', 'HUMIDIFIER', 'KETTLE', 'LIGHT', 'LOCK',
  'MICROWAVE', 'MOP', 'MOWER', 'MULTICOOKER', 'NETWORK', 'OUTLET', 'OVEN',
  'PERGOLA', 'PETFEEDER', 'PRESSURECOOKER', 'RADIATOR', 'REFRIGERATOR',
  'REMOTECONTROL', 'ROUTER', 'SCENE', 'SECURITYSYSTEM', 'SETTOP', 'SHOWER',
  'SHUTTER', 'SMOKE_DETECTOR', 'SOUNDBAR', 'SOUSVIDE', 'SPEAKER', 'SPRINKLER',
  'STANDMIXER', 'STREAMING_BOX', 'STREAMING_SOUNDBAR', 'STREAMING_STICK',
  'SWITCH', 'THERMOSTAT', 'TV', 'VACUUM', 'VALVE', 'WASHER', 'WATERHEATER',
  'WATERPURIFIER', 'WATERSOFTENER', 'WINDOW', 'YOGURTMAKER',
] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

const TYPE_PREFIX = 'action.devices.types.';

export function deviceTypeTag(type: DeviceType): string {
  return TYPE_PREFIX + type;
}
