/**
 * Capability registry.
 *
 * `CapabilityMap` ties each trait name to the interface a device implements
 * to support it, and `TRAIT_DEFINITIONS` to the way that trait contributes
 * to SYNC and QUERY.
 */

import { appSelectorTrait } from './app-selector';
import type { AppSelector } from './app-selector';
import { armDisarmTrait } from './arm-disarm';
import type { ArmDisarm } from './arm-disarm';
import { brightnessTrait } from './brightness';
import type { Brightness } from './brightness';
import { cameraStreamTrait } from './camera-stream';
import type { CameraStream } from './camera-stream';
import { channelTrait } from './channel';
import type { Channel } from './channel';
import { colorSettingTrait } from './color-setting';
import type { ColorSetting } from './color-setting';
import { cookTrait } from './cook';
import type { Cook } from './cook';
import { dispenseTrait } from './dispense';
import type { Dispense } from './dispense';
import { dockTrait } from './dock';
import type { Dock } from './dock';
import { energyStorageTrait } from './energy-storage';
import type { EnergyStorage } from './energy-storage';
import { fanSpeedTrait } from './fan-speed';
import type { FanSpeed } from './fan-speed';
import { fillTrait } from './fill';
import type { Fill } from './fill';
import { humiditySettingTrait } from './humidity-setting';
import type { HumiditySetting } from './humidity-setting';
import { inputSelectorTrait } from './input-selector';
import type { InputSelector } from './input-selector';
import { lightEffectsTrait } from './light-effects';
import type { LightEffects } from './light-effects';
import { locatorTrait } from './locator';
import type { Locator } from './locator';
import { lockUnlockTrait } from './lock-unlock';
import type { LockUnlock } from './lock-unlock';
import { mediaStateTrait } from './media-state';
import type { MediaState } from './media-state';
import { modesTrait } from './modes';
import type { Modes } from './modes';
import { networkControlTrait } from './network-control';
import type { NetworkControl } from './network-control';
import { onOffTrait } from './on-off';
import type { OnOff } from './on-off';
import { openCloseTrait } from './open-close';
import type { OpenClose } from './open-close';
import { rebootTrait } from './reboot';
import type { Reboot } from './reboot';
import { rotationTrait } from './rotation';
import type { Rotation } from './rotation';
import { runCycleTrait } from './run-cycle';
import type { RunCycle } from './run-cycle';
import { sceneTrait } from './scene';
import type { Scene } from './scene';
import { sensorStateTrait } from './sensor-state';
import type { SensorState } from './sensor-state';
import { softwareUpdateTrait } from './software-update';
import type { SoftwareUpdate } from './software-update';
import { startStopTrait } from './start-stop';
import type { StartStop } from './start-stop';
import { statusReportTrait } from './status-report';
import type { StatusReport } from './status-report';
import { temperatureControlTrait } from './temperature-control';
import type { TemperatureControl } from './temperature-control';
import { temperatureSettingTrait } from './temperature-setting';
import type { TemperatureSetting } from './temperature-setting';
import { timerTrait } from './timer';
import type { Timer } from './timer';
import { togglesTrait } from './toggles';
import type { Toggles } from './toggles';
import { transportControlTrait } from './transport-control';
import type { TransportControl } from './transport-control';
import { volumeTrait } from './volume';
import type { Volume } from './volume';
import type { TraitDefinition } from './trait-definition';

export * from './common';
export * from './app-selector';
export * from './arm-disarm';
export * from './brightness';
export * from './camera-stream';
export * from './channel';
export * from './color-setting';
export * from './cook';
export * from './dispense';
export * from './dock';
export * from './energy-storage';
export * from './fan-speed';
export * from './fill';
export * from './humidity-setting';
export * from './input-selector';
export * from './light-effects';
export * from './locator';
export * from './lock-unlock';
export * from './media-state';
export * from './modes';
export * from './network-control';
export * from './on-off';
export * from './open-close';
export * from './reboot';
export * from './rotation';
export * from './run-cycle';
export * from './scene';
export * from './sensor-state';
export * from './software-update';
export * from './start-stop';
export * from './status-report';
export * from './temperature-control';
export * from './temperature-setting';
export * from './timer';
export * from './toggles';
export * from './transport-control';
export * from './volume';
export { compact } from './trait-definition';
export type { TraitDefinition } from './trait-definition';

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export interface CapabilityMap {
  AppSelector: AppSelector;
  ArmDisarm: ArmDisarm;
  Brightness: Brightness;
  CameraStream: CameraStream;
  Channel: Channel;
  ColorSetting: ColorSetting;
  Cook: Cook;
  Dispense: Dispense;
  Dock: Dock;
  EnergyStorage: EnergyStorage;
  FanSpeed: FanSpeed;
  Fill: Fill;
  HumiditySetting: HumiditySetting;
  InputSelector: InputSelector;
  LightEffects: LightEffects;
  Locator: Locator;
  LockUnlock: LockUnlock;
  MediaState: MediaState;
  Modes: Modes;
  NetworkControl: NetworkControl;
  OnOff: OnOff;
  OpenClose: OpenClose;
  Reboot: Reboot;
  Rotation: Rotation;
  RunCycle: RunCycle;
  Scene: Scene;
  SensorState: SensorState;
  SoftwareUpdate: SoftwareUpdate;
  StartStop: StartStop;
  StatusReport: StatusReport;
  TemperatureControl: TemperatureControl;
  TemperatureSetting: TemperatureSetting;
  Timer: Timer;
  Toggles: Toggles;
  TransportControl: TransportControl;
  Volume: Volume;
}

export type TraitName = keyof CapabilityMap;

export const TRAIT_DEFINITIONS: { [K in TraitName]: TraitDefinition<CapabilityMap[K]> } = {
  AppSelector: appSelectorTrait,
  ArmDisarm: armDisarmTrait,
  Brightness: brightnessTrait,
  CameraStream: cameraStreamTrait,
  Channel: channelTrait,
  ColorSetting: colorSettingTrait,
  Cook: cookTrait,
  Dispense: dispenseTrait,
  Dock: dockTrait,
  EnergyStorage: energyStorageTrait,
  FanSpeed: fanSpeedTrait,
  Fill: fillTrait,
  HumiditySetting: humiditySettingTrait,
  InputSelector: inputSelectorTrait,
  LightEffects: lightEffectsTrait,
  Locator: locatorTrait,
  LockUnlock: lockUnlockTrait,
  MediaState: mediaStateTrait,
  Modes: modesTrait,
  NetworkControl: networkControlTrait,
  OnOff: onOffTrait,
  OpenClose: openCloseTrait,
  Reboot: rebootTrait,
  Rotation: rotationTrait,
  RunCycle: runCycleTrait,
  Scene: sceneTrait,
  SensorState: sensorStateTrait,
  SoftwareUpdate: softwareUpdateTrait,
  StartStop: startStopTrait,
  StatusReport: statusReportTrait,
  TemperatureControl: temperatureControlTrait,
  TemperatureSetting: temperatureSettingTrait,
  Timer: timerTrait,
  Toggles: togglesTrait,
  TransportControl: transportControlTrait,
  Volume: volumeTrait,
};

const TRAIT_PREFIX = 'action.devices.traits.';

/** Wire identifier of a trait, e.g. `action.devices.traits.OnOff`. */
export function traitTag(name: TraitName): string {
  return TRAIT_PREFIX + name;
}
