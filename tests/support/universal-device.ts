import { Device } from '../../src/devices';
import type { SmartHomeDevice } from '../../src/devices';
import type {
  AppSelector,
  ArmDisarm,
  Brightness,
  CameraStream,
  Channel,
  ColorSetting,
  Cook,
  Dispense,
  Dock,
  EnergyStorage,
  FanSpeed,
  Fill,
  HumiditySetting,
  InputSelector,
  LightEffects,
  Locator,
  LockUnlock,
  MediaState,
  Modes,
  NetworkControl,
  OnOff,
  OpenClose,
  Reboot,
  Rotation,
  RunCycle,
  Scene,
  SensorState,
  SoftwareUpdate,
  StartStop,
  StatusReport,
  TemperatureControl,
  TemperatureSetting,
  Timer,
  Toggles,
  TransportControl,
  Volume,
} from '../../src/traits';

export type UniversalDevice = SmartHomeDevice &
  AppSelector &
  ArmDisarm &
  Brightness &
  CameraStream &
  Channel &
  ColorSetting &
  Cook &
  Dispense &
  Dock &
  EnergyStorage &
  FanSpeed &
  Fill &
  HumiditySetting &
  InputSelector &
  LightEffects &
  Locator &
  LockUnlock &
  MediaState &
  Modes &
  NetworkControl &
  OnOff &
  OpenClose &
  Reboot &
  Rotation &
  RunCycle &
  Scene &
  SensorState &
  SoftwareUpdate &
  StartStop &
  StatusReport &
  TemperatureControl &
  TemperatureSetting &
  Timer &
  Toggles &
  TransportControl &
  Volume;

/**
 * A device registering every trait.  Getters answer fixed values; every
 * mutating call is recorded in `calls` as `name(arg, ...)` with JSON
 * arguments.
 */
export function makeUniversalDevice(id = 'remote-1'): {
  device: Device<UniversalDevice>;
  impl: UniversalDevice;
  calls: string[];
} {
  const calls: string[] = [];
  const record = (name: string, ...args: unknown[]): void => {
    calls.push(`${name}(${args.map((a) => (a === undefined ? 'undefined' : JSON.stringify(a))).join(', ')})`);
  };

  const impl: UniversalDevice = {
    // identity
    getDeviceInfo: () => ({ manufacturer: 'Test Works', model: 'UR-1', hwVersion: '1', swVersion: '1' }),
    getDeviceName: () => ({ name: 'Universal remote', defaultNames: [], nicknames: [] }),
    willReportState: () => false,
    isOnline: () => true,

    // AppSelector
    getAvailableApplications: () => [],
    getCurrentApplication: () => 'news',
    appInstallKey: (key) => record('appInstallKey', key),
    appInstallName: (name) => record('appInstallName', name),
    appSearchKey: (key) => record('appSearchKey', key),
    appSearchName: (name) => record('appSearchName', name),
    appSelectKey: (key) => record('appSelectKey', key),
    appSelectName: (name) => record('appSelectName', name),

    // ArmDisarm
    getAvailableArmLevels: () => undefined,
    isOrdered: () => false,
    isArmed: () => false,
    currentArmLevel: () => 'home',
    exitAllowance: () => 0,
    arm: (arm) => record('arm', arm),
    cancelArm: () => record('cancelArm'),
    armWithLevel: (arm, level) => record('armWithLevel', arm, level),

    // Brightness
    isCommandOnlyBrightness: () => false,
    getBrightness: () => 50,
    setBrightnessAbsolute: (brightness) => record('setBrightnessAbsolute', brightness),
    setBrightnessRelativePercent: (percent) => record('setBrightnessRelativePercent', percent),
    setBrightnessRelativeWeight: (weight) => record('setBrightnessRelativeWeight', weight),

    // CameraStream
    getSupportedCameraStreamProtocols: () => ['hls'],
    needAuthToken: () => false,
    getCameraStream: (toChromecast, protocols) => {
      record('getCameraStream', toChromecast, protocols);
      return { cameraStreamProtocol: 'hls', cameraStreamAccessUrl: 'https://camera.test/stream.m3u8' };
    },

    // Channel
    getAvailableChannels: () => [],
    selectChannelById: (code, name, number) => record('selectChannelById', code, name, number),
    selectChannelByNumber: (number) => record('selectChannelByNumber', number),
    selectChannelRelative: (change) => record('selectChannelRelative', change),
    returnToLastChannel: () => record('returnToLastChannel'),

    // ColorSetting
    isCommandOnlyColorSetting: () => false,
    getColorModelSupport: () => ({ colorModel: 'rgb' }),
    getColor: () => ({ spectrumRgb: 0 }),
    setColor: (color) => record('setColor', color),

    // Cook
    getSupportedCookingModes: () => ['BAKE'],
    getFoodPresets: () => [],
    getCurrentCookingMode: () => 'NONE',
    getCurrentFoodPreset: () => undefined,
    getCurrentFoodQuantity: () => undefined,
    getCurrentFoodUnit: () => undefined,
    start: (config) => record('start', config),
    stop: () => record('stop'),

    // Dispense
    getSupportedDispenseItems: () => [],
    getSupportedDispensePresets: () => [],
    getDispenseItemsState: () => [],
    dispenseAmount: (item, amount, unit) => record('dispenseAmount', item, amount, unit),
    dispensePreset: (preset) => record('dispensePreset', preset),
    dispenseDefault: () => record('dispenseDefault'),

    // Dock
    isDocked: () => false,
    dock: () => record('dock'),

    // EnergyStorage
    isQueryOnly: () => false,
    getDistanceUnitForUx: () => 'KILOMETERS',
    isRechargeable: () => true,
    getDescriptiveCapacityRemaining: () => 'FULL',
    charge: (charge) => record('charge', charge),

    // FanSpeed
    getAvailableFanSpeeds: () => undefined,
    supportsFanSpeedPercent: () => true,
    getCurrentFanSpeedSetting: () => undefined,
    getCurrentFanSpeedPercent: () => 0,
    setFanSpeedSetting: (name) => record('setFanSpeedSetting', name),
    setFanSpeedPercent: (percent) => record('setFanSpeedPercent', percent),
    setFanSpeedRelativeWeight: (weight) => record('setFanSpeedRelativeWeight', weight),
    setFanSpeedRelativePercent: (percent) => record('setFanSpeedRelativePercent', percent),
    setFanReverse: () => record('setFanReverse'),

    // Fill
    getAvailableFillLevels: () => ({ levels: [], ordered: false, supportsFillPercent: true }),
    isFilled: () => false,
    getCurrentFillLevel: () => undefined,
    getCurrentFillPercent: () => 0,
    fill: (fill) => record('fill', fill),
    fillToLevel: (level) => record('fillToLevel', level),
    fillToPercent: (percent) => record('fillToPercent', percent),

    // HumiditySetting
    getHumiditySetpointPercent: () => 40,
    getHumidityAmbientPercent: () => 38,
    setHumidity: (humidity) => record('setHumidity', humidity),
    setHumidityRelativePercent: (percent) => record('setHumidityRelativePercent', percent),
    setHumidityRelativeWeight: (weight) => record('setHumidityRelativeWeight', weight),

    // InputSelector
    getAvailableInputs: () => [],
    getCurrentInput: () => 'hdmi_1',
    setInput: (input) => record('setInput', input),
    setNextInput: () => record('setNextInput'),
    setPreviousInput: () => record('setPreviousInput'),

    // LightEffects
    getSupportedEffects: () => ['colorLoop'],
    getActiveLightEffect: () => undefined,
    getLightEffectEndUnixTimestampSec: () => undefined,
    setColorLoop: (duration) => record('setColorLoop', duration),
    setSleep: (duration) => record('setSleep', duration),
    setWake: (duration) => record('setWake', duration),
    stopEffect: () => record('stopEffect'),

    // Locator
    locate: (silence, lang) => record('locate', silence, lang),

    // LockUnlock
    isLocked: () => true,
    isJammed: () => false,
    setLocked: (lock) => record('setLocked', lock),

    // MediaState
    getActivityState: () => undefined,
    getPlaybackState: () => undefined,

    // Modes
    getAvailableModes: () => [],
    getCurrentModeSettings: () => ({}),
    updateMode: (mode, setting) => record('updateMode', mode, setting),

    // NetworkControl
    isNetworkEnabled: () => true,
    getNetworkSettings: () => ({ ssid: 'test-net' }),
    isGuestNetworkEnabled: () => false,
    getGuestNetworkSettings: () => ({ ssid: 'test-guest' }),
    getNumConnectedDevices: () => 0,
    getNetworkUsageMb: () => 0,
    getNetworkUsageLimitMb: () => 0,
    isNetworkUsageUnlimited: () => true,
    getLastNetworkDownloadSpeedTest: () => ({ downloadSpeedMbps: 1, unixTimestampSec: 0, status: 'SUCCESS' }),
    getLastNetworkUploadSpeedTest: () => ({ uploadSpeedMbps: 1, unixTimestampSec: 0, status: 'SUCCESS' }),
    getNetworkProfilesState: () => ({}),
    setGuestNetworkEnabled: (enable) => record('setGuestNetworkEnabled', enable),
    setNetworkProfileEnabled: (profile, enable) => record('setNetworkProfileEnabled', profile, enable),
    getGuestNetworkPassword: () => {
      record('getGuestNetworkPassword');
      return 'guest-pass';
    },
    testNetworkSpeed: (download, upload) => record('testNetworkSpeed', download, upload),

    // OnOff
    isOn: () => false,
    setOn: (on) => record('setOn', on),

    // OpenClose
    getOpenPercent: () => 0,
    getOpenState: () => undefined,
    setOpen: (percent, direction) => record('setOpen', percent, direction),
    setOpenRelative: (percent, direction) => record('setOpenRelative', percent, direction),

    // Reboot
    reboot: () => record('reboot'),

    // Rotation
    supportsDegrees: () => true,
    supportsPercent: () => true,
    getRotationDegreesRange: () => ({ rotationDegreesMin: 0, rotationDegreesMax: 180 }),
    getRotationDegrees: () => 0,
    getRotationPercent: () => 0,
    setRotationDegrees: (degrees) => record('setRotationDegrees', degrees),
    setRotationPercent: (percent) => record('setRotationPercent', percent),

    // RunCycle
    getCurrentRunCycle: () => [],
    getCurrentTotalRemainingTime: () => 0,
    getCurrentCycleRemainingTime: () => 0,

    // Scene
    activate: () => record('activate'),
    deactivate: () => record('deactivate'),

    // SensorState
    getSupportedSensorStates: () => [],
    getCurrentSensorStates: () => [],

    // SoftwareUpdate
    getLastSoftwareUpdateUnixTimestampSec: () => 0,
    performUpdate: () => record('performUpdate'),

    // StartStop
    isRunning: () => false,
    startStop: (start, zones) => record('startStop', start, zones),
    pauseUnpause: (pause) => record('pauseUnpause', pause),

    // StatusReport
    getCurrentStatusReport: () => [],

    // TemperatureControl
    getTemperatureRange: () => ({ minThresholdCelsius: 0, maxThresholdCelsius: 250 }),
    getTemperatureUnitForUx: () => 'C',
    getTemperatureSetpointCelsius: () => 20,
    getTemperatureAmbientCelsius: () => 19,
    setTemperature: (temperature) => record('setTemperature', temperature),

    // TemperatureSetting
    getAvailableThermostatModes: () => ['heat', 'cool'],
    getThermostatTemperatureUnit: () => 'C',
    getActiveThermostatMode: () => 'heat',
    getThermostatState: () => ({
      thermostatMode: 'heat',
      thermostatTemperatureAmbient: 19,
      thermostatTemperatureSetpoint: 21,
    }),
    setTemperatureSetpoint: (setpoint) => record('setTemperatureSetpoint', setpoint),
    setTemperatureSetRange: (high, low) => record('setTemperatureSetRange', high, low),
    setThermostatMode: (mode) => record('setThermostatMode', mode),
    setTemperatureRelativeDegree: (degrees) => record('setTemperatureRelativeDegree', degrees),
    setTemperatureRelativeWeight: (weight) => record('setTemperatureRelativeWeight', weight),

    // Timer
    getMaxTimerLimitSec: () => 3600,
    getTimerRemainingSec: () => undefined,
    startTimer: (seconds) => record('startTimer', seconds),
    adjustTimer: (seconds) => record('adjustTimer', seconds),
    pauseTimer: () => record('pauseTimer'),
    resumeTimer: () => record('resumeTimer'),
    cancelTimer: () => record('cancelTimer'),

    // Toggles
    getAvailableToggles: () => [],
    getCurrentToggleSettings: () => ({}),
    setToggle: (name, value) => record('setToggle', name, value),

    // TransportControl
    getSupportedControlCommands: () => ['NEXT'],
    mediaStop: () => record('mediaStop'),
    mediaNext: () => record('mediaNext'),
    mediaPrevious: () => record('mediaPrevious'),
    mediaPause: () => record('mediaPause'),
    mediaResume: () => record('mediaResume'),
    mediaSeekRelative: (ms) => record('mediaSeekRelative', ms),
    mediaSeekToPosition: (ms) => record('mediaSeekToPosition', ms),
    mediaRepeatMode: (isOn, isSingle) => record('mediaRepeatMode', isOn, isSingle),
    mediaShuffle: () => record('mediaShuffle'),
    mediaClosedCaptioningOn: (language, userLanguage) => record('mediaClosedCaptioningOn', language, userLanguage),
    mediaClosedCaptioningOff: () => record('mediaClosedCaptioningOff'),

    // Volume
    getVolumeMaxLevel: () => 100,
    canMuteAndUnmute: () => true,
    getCurrentVolume: () => 10,
    isMuted: () => false,
    mute: (mute) => record('mute', mute),
    setVolume: (level) => record('setVolume', level),
    setVolumeRelative: (steps) => record('setVolumeRelative', steps),
  };

  const device = new Device(impl, 'REMOTECONTROL', id)
    .register('AppSelector')
    .register('ArmDisarm')
    .register('Brightness')
    .register('CameraStream')
    .register('Channel')
    .register('ColorSetting')
    .register('Cook')
    .register('Dispense')
    .register('Dock')
    .register('EnergyStorage')
    .register('FanSpeed')
    .register('Fill')
    .register('HumiditySetting')
    .register('InputSelector')
    .register('LightEffects')
    .register('Locator')
    .register('LockUnlock')
    .register('MediaState')
    .register('Modes')
    .register('NetworkControl')
    .register('OnOff')
    .register('OpenClose')
    .register('Reboot')
    .register('Rotation')
    .register('RunCycle')
    .register('Scene')
    .register('SensorState')
    .register('SoftwareUpdate')
    .register('StartStop')
    .register('StatusReport')
    .register('TemperatureControl')
    .register('TemperatureSetting')
    .register('Timer')
    .register('Toggles')
    .register('TransportControl')
    .register('Volume');

  return { device, impl, calls };
}
