/**
 * EXECUTE command schemas.
 *
 * One schema per `action.devices.commands.*` identifier, carrying exactly
 * the parameters that command takes.  `DeviceCommand` is the tagged union
 * the dispatcher switches on.
 */

import { z } from 'zod';
import {
  CAMERA_STREAM_PROTOCOLS,
  COOKING_MODES,
  LANGUAGES,
  OPEN_DIRECTIONS,
  SIZE_UNITS,
  THERMOSTAT_MODES,
} from '../traits';

const bare = <N extends string>(name: N) =>
  z.object({ command: z.literal(name), params: z.object({}).optional() });

const withParams = <N extends string, P extends z.ZodRawShape>(name: N, params: P) =>
  z.object({ command: z.literal(name), params: z.object(params) });

const appParams = {
  newApplication: z.string().optional(),
  newApplicationName: z.string().optional(),
};

const durationParams = { duration: z.number().int().optional() };

const hsv = z.object({ hue: z.number(), saturation: z.number(), value: z.number() });

const color = z.union([
  z.object({ temperature: z.number().int() }),
  z.object({ spectrumRGB: z.number().int() }),
  z.object({ spectrumHSV: hsv }),
]);

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export const commandSchema = z.discriminatedUnion('command', [
  // AppSelector
  withParams('action.devices.commands.appInstall', appParams),
  withParams('action.devices.commands.appSearch', appParams),
  withParams('action.devices.commands.appSelect', appParams),

  // ArmDisarm
  withParams('action.devices.commands.ArmDisarm', {
    arm: z.boolean(),
    cancel: z.boolean().optional(),
    armLevel: z.string().optional(),
    followUpToken: z.string().optional(),
  }),

  // Brightness
  withParams('action.devices.commands.BrightnessAbsolute', { brightness: z.number().int() }),
  withParams('action.devices.commands.BrightnessRelative', {
    brightnessRelativePercent: z.number().int().optional(),
    brightnessRelativeWeight: z.number().int().optional(),
  }),

  // CameraStream
  withParams('action.devices.commands.GetCameraStream', {
    StreamToChromecast: z.boolean(),
    SupportedStreamProtocols: z.array(z.enum(CAMERA_STREAM_PROTOCOLS)),
  }),

  // Channel
  withParams('action.devices.commands.selectChannel', {
    channelCode: z.string().optional(),
    channelName: z.string().optional(),
    channelNumber: z.string().optional(),
  }),
  withParams('action.devices.commands.relativeChannel', { relativeChannelChange: z.number().int() }),
  bare('action.devices.commands.returnChannel'),

  // ColorSetting
  withParams('action.devices.commands.ColorAbsolute', { color }),

  // Cook
  withParams('action.devices.commands.Cook', {
    start: z.boolean(),
    cookingMode: z.enum(COOKING_MODES).optional(),
    foodPreset: z.string().optional(),
    quantity: z.number().optional(),
    unit: z.enum(SIZE_UNITS).optional(),
  }),

  // Dispense
  withParams('action.devices.commands.Dispense', {
    item: z.string().optional(),
    amount: z.number().optional(),
    unit: z.enum(SIZE_UNITS).optional(),
    presetName: z.string().optional(),
  }),

  // Dock
  bare('action.devices.commands.Dock'),

  // EnergyStorage
  withParams('action.devices.commands.Charge', { charge: z.boolean() }),

  // FanSpeed
  withParams('action.devices.commands.SetFanSpeed', {
    fanSpeed: z.string().optional(),
    fanSpeedPercent: z.number().optional(),
  }),
  withParams('action.devices.commands.SetFanSpeedRelative', {
    fanSpeedRelativeWeight: z.number().int().optional(),
    fanSpeedRelativePercent: z.number().optional(),
  }),
  bare('action.devices.commands.Reverse'),

  // Fill
  withParams('action.devices.commands.Fill', {
    fill: z.boolean(),
    fillLevel: z.string().optional(),
    fillPercent: z.number().optional(),
  }),

  // HumiditySetting
  withParams('action.devices.commands.SetHumidity', { humidity: z.number().int() }),
  withParams('action.devices.commands.HumidityRelative', {
    humidityRelativePercent: z.number().int().optional(),
    humidityRelativeWeight: z.number().int().optional(),
  }),

  // InputSelector
  withParams('action.devices.commands.SetInput', { newInput: z.string() }),
  bare('action.devices.commands.NextInput'),
  bare('action.devices.commands.PreviousInput'),

  // LightEffects
  withParams('action.devices.commands.ColorLoop', durationParams),
  withParams('action.devices.commands.Sleep', durationParams),
  withParams('action.devices.commands.Wake', durationParams),
  bare('action.devices.commands.StopEffect'),

  // Locator
  z.object({
    command: z.literal('action.devices.commands.Locate'),
    params: z
      .object({
        silence: z.boolean().default(false),
        lang: z.enum(LANGUAGES).default('en'),
      })
      .default({}),
  }),

  // LockUnlock
  withParams('action.devices.commands.LockUnlock', {
    lock: z.boolean(),
    followUpToken: z.string().optional(),
  }),

  // Modes
  withParams('action.devices.commands.SetModes', {
    updateModeSettings: z.record(z.string()),
  }),

  // NetworkControl
  withParams('action.devices.commands.EnableDisableGuestNetwork', { enable: z.boolean() }),
  withParams('action.devices.commands.EnableDisableNetworkProfile', {
    profile: z.string(),
    enable: z.boolean(),
  }),
  bare('action.devices.commands.GetGuestNetworkPassword'),
  withParams('action.devices.commands.TestNetworkSpeed', {
    testDownloadSpeed: z.boolean(),
    testUploadSpeed: z.boolean(),
    followUpToken: z.string().optional(),
  }),

  // OnOff
  withParams('action.devices.commands.OnOff', { on: z.boolean() }),

  // OpenClose
  withParams('action.devices.commands.OpenClose', {
    openPercent: z.number(),
    openDirection: z.enum(OPEN_DIRECTIONS).optional(),
  }),
  withParams('action.devices.commands.OpenCloseRelative', {
    openRelativePercent: z.number(),
    openDirection: z.enum(OPEN_DIRECTIONS).optional(),
  }),

  // Reboot
  bare('action.devices.commands.Reboot'),

  // Rotation
  withParams('action.devices.commands.RotateAbsolute', {
    rotationDegrees: z.number().optional(),
    rotationPercent: z.number().optional(),
  }),

  // Scene
  z.object({
    command: z.literal('action.devices.commands.ActivateScene'),
    params: z.object({ deactivate: z.boolean().default(false) }).default({}),
  }),

  // SoftwareUpdate
  bare('action.devices.commands.SoftwareUpdate'),

  // StartStop
  withParams('action.devices.commands.StartStop', {
    start: z.boolean(),
    zone: z.string().optional(),
    multipleZones: z.array(z.string()).optional(),
  }),
  withParams('action.devices.commands.PauseUnpause', { pause: z.boolean() }),

  // TemperatureControl
  withParams('action.devices.commands.SetTemperature', { temperature: z.number() }),

  // TemperatureSetting
  withParams('action.devices.commands.ThermostatTemperatureSetpoint', {
    thermostatTemperatureSetpoint: z.number(),
  }),
  withParams('action.devices.commands.ThermostatTemperatureSetRange', {
    thermostatTemperatureSetpointHigh: z.number(),
    thermostatTemperatureSetpointLow: z.number(),
  }),
  withParams('action.devices.commands.ThermostatSetMode', {
    thermostatMode: z.enum(THERMOSTAT_MODES),
  }),
  withParams('action.devices.commands.TemperatureRelative', {
    thermostatTemperatureRelativeDegree: z.number().optional(),
    thermostatTemperatureRelativeWeight: z.number().int().optional(),
  }),

  // Timer
  withParams('action.devices.commands.TimerStart', { timerTimeSec: z.number().int() }),
  withParams('action.devices.commands.TimerAdjust', { timerTimeSec: z.number().int() }),
  bare('action.devices.commands.TimerPause'),
  bare('action.devices.commands.TimerResume'),
  bare('action.devices.commands.TimerCancel'),

  // Toggles
  withParams('action.devices.commands.SetToggles', {
    updateToggleSettings: z.record(z.boolean()),
  }),

  // TransportControl
  bare('action.devices.commands.mediaStop'),
  bare('action.devices.commands.mediaNext'),
  bare('action.devices.commands.mediaPrevious'),
  bare('action.devices.commands.mediaPause'),
  bare('action.devices.commands.mediaResume'),
  withParams('action.devices.commands.mediaSeekRelative', { relativePositionMs: z.number().int() }),
  withParams('action.devices.commands.mediaSeekToPosition', { absPositionMs: z.number().int() }),
  z.object({
    command: z.literal('action.devices.commands.mediaRepeatMode'),
    params: z.object({ isOn: z.boolean(), isSingle: z.boolean().default(false) }),
  }),
  bare('action.devices.commands.mediaShuffle'),
  withParams('action.devices.commands.mediaClosedCaptioningOn', {
    closedCaptioningLanguage: z.string(),
    userQueryLanguage: z.string(),
  }),
  bare('action.devices.commands.mediaClosedCaptioningOff'),

  // Volume
  withParams('action.devices.commands.mute', { mute: z.boolean() }),
  withParams('action.devices.commands.setVolume', { volumeLevel: z.number().int() }),
  withParams('action.devices.commands.volumeRelative', { relativeSteps: z.number().int() }),
]);

export type DeviceCommand = z.infer<typeof commandSchema>;

export type CommandName = DeviceCommand['command'];
