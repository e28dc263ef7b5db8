/**
 * Device controller: runs one EXECUTE command against one device.
 *
 * Resolves the capability slot the command targets, invokes the matching
 * operation under the device handle and folds any failure into the
 * serializable/server taxonomy.  A command aimed at a trait the device
 * never registered raises `UnsupportedCapabilityError` instead of
 * producing an outcome.
 */

import type { Logger } from 'pino';
import { classifyError } from '../errors';
import type { ExecuteError } from '../errors';
import type { DeviceCommand } from '../fulfillment/commands';
import type { StateFragment } from '../traits';
import type { Device } from './device';

export type ExecuteOutcome =
  | { ok: true; states: StateFragment }
  | { ok: false; error: ExecuteError };

export class DeviceController {
  constructor(private readonly logger?: Logger) {}

  async execute(device: Device, command: DeviceCommand): Promise<ExecuteOutcome> {
    try {
      const states = await this.dispatch(device, command);
      this.logger?.debug({ deviceId: device.id, command: command.command }, 'command succeeded');
      return { ok: true, states };
    } catch (err) {
      const error = classifyError(err);
      this.logger?.debug({ deviceId: device.id, command: command.command, error }, 'command failed');
      return { ok: false, error };
    }
  }

  /**
   * Map a command onto capability calls.  Each call takes its own
   * acquisition of the device handle; commands with several independent
   * parameters make one call per parameter present.
   */
  private async dispatch(device: Device, command: DeviceCommand): Promise<StateFragment> {
    switch (command.command) {
      // AppSelector
      case 'action.devices.commands.appInstall': {
        const cap = device.capability('AppSelector');
        const { newApplication, newApplicationName } = command.params;
        if (newApplication !== undefined) await cap.use((d) => d.appInstallKey(newApplication));
        if (newApplicationName !== undefined) await cap.use((d) => d.appInstallName(newApplicationName));
        return {};
      }
      case 'action.devices.commands.appSearch': {
        const cap = device.capability('AppSelector');
        const { newApplication, newApplicationName } = command.params;
        if (newApplication !== undefined) await cap.use((d) => d.appSearchKey(newApplication));
        if (newApplicationName !== undefined) await cap.use((d) => d.appSearchName(newApplicationName));
        return {};
      }
      case 'action.devices.commands.appSelect': {
        const cap = device.capability('AppSelector');
        const { newApplication, newApplicationName } = command.params;
        if (newApplication !== undefined) await cap.use((d) => d.appSelectKey(newApplication));
        if (newApplicationName !== undefined) await cap.use((d) => d.appSelectName(newApplicationName));
        return {};
      }

      // ArmDisarm
      case 'action.devices.commands.ArmDisarm': {
        const cap = device.capability('ArmDisarm');
        const { arm, cancel, armLevel } = command.params;
        if (cancel) {
          await cap.use((d) => d.cancelArm());
        } else if (armLevel !== undefined) {
          await cap.use((d) => d.armWithLevel(arm, armLevel));
        } else {
          await cap.use((d) => d.arm(arm));
        }
        return {};
      }

      // Brightness
      case 'action.devices.commands.BrightnessAbsolute': {
        const { brightness } = command.params;
        await device.capability('Brightness').use((d) => d.setBrightnessAbsolute(brightness));
        return {};
      }
      case 'action.devices.commands.BrightnessRelative': {
        const cap = device.capability('Brightness');
        const { brightnessRelativePercent, brightnessRelativeWeight } = command.params;
        if (brightnessRelativePercent !== undefined) {
          await cap.use((d) => d.setBrightnessRelativePercent(brightnessRelativePercent));
        }
        if (brightnessRelativeWeight !== undefined) {
          await cap.use((d) => d.setBrightnessRelativeWeight(brightnessRelativeWeight));
        }
        return {};
      }

      // CameraStream
      case 'action.devices.commands.GetCameraStream': {
        const { StreamToChromecast, SupportedStreamProtocols } = command.params;
        const stream = await device
          .capability('CameraStream')
          .use((d) => d.getCameraStream(StreamToChromecast, SupportedStreamProtocols));
        return { ...stream };
      }

      // Channel
      case 'action.devices.commands.selectChannel': {
        const cap = device.capability('Channel');
        const { channelCode, channelName, channelNumber } = command.params;
        if (channelCode !== undefined) {
          await cap.use((d) => d.selectChannelById(channelCode, channelName, channelNumber));
        } else if (channelNumber !== undefined) {
          await cap.use((d) => d.selectChannelByNumber(channelNumber));
        }
        return {};
      }
      case 'action.devices.commands.relativeChannel': {
        const { relativeChannelChange } = command.params;
        await device.capability('Channel').use((d) => d.selectChannelRelative(relativeChannelChange));
        return {};
      }
      case 'action.devices.commands.returnChannel':
        await device.capability('Channel').use((d) => d.returnToLastChannel());
        return {};

      // ColorSetting
      case 'action.devices.commands.ColorAbsolute': {
        const { color } = command.params;
        await device.capability('ColorSetting').use((d) => d.setColor(color));
        return {};
      }

      // Cook
      case 'action.devices.commands.Cook': {
        const cap = device.capability('Cook');
        const { start, ...config } = command.params;
        if (start) {
          await cap.use((d) => d.start(config));
        } else {
          await cap.use((d) => d.stop());
        }
        return {};
      }

      // Dispense
      case 'action.devices.commands.Dispense': {
        const cap = device.capability('Dispense');
        const { item, amount, unit, presetName } = command.params;
        if (item !== undefined && amount !== undefined && unit !== undefined) {
          await cap.use((d) => d.dispenseAmount(item, amount, unit));
        } else if (presetName !== undefined) {
          await cap.use((d) => d.dispensePreset(presetName));
        } else {
          await cap.use((d) => d.dispenseDefault());
        }
        return {};
      }

      // Dock
      case 'action.devices.commands.Dock':
        await device.capability('Dock').use((d) => d.dock());
        return {};

      // EnergyStorage
      case 'action.devices.commands.Charge': {
        const { charge } = command.params;
        await device.capability('EnergyStorage').use((d) => d.charge(charge));
        return {};
      }

      // FanSpeed
      case 'action.devices.commands.SetFanSpeed': {
        const cap = device.capability('FanSpeed');
        const { fanSpeed, fanSpeedPercent } = command.params;
        if (fanSpeed !== undefined) await cap.use((d) => d.setFanSpeedSetting(fanSpeed));
        if (fanSpeedPercent !== undefined) await cap.use((d) => d.setFanSpeedPercent(fanSpeedPercent));
        return {};
      }
      case 'action.devices.commands.SetFanSpeedRelative': {
        const cap = device.capability('FanSpeed');
        const { fanSpeedRelativeWeight, fanSpeedRelativePercent } = command.params;
        if (fanSpeedRelativeWeight !== undefined) {
          await cap.use((d) => d.setFanSpeedRelativeWeight(fanSpeedRelativeWeight));
        }
        if (fanSpeedRelativePercent !== undefined) {
          await cap.use((d) => d.setFanSpeedRelativePercent(fanSpeedRelativePercent));
        }
        return {};
      }
      case 'action.devices.commands.Reverse':
        await device.capability('FanSpeed').use((d) => d.setFanReverse());
        return {};

      // Fill
      case 'action.devices.commands.Fill': {
        const cap = device.capability('Fill');
        const { fill, fillLevel, fillPercent } = command.params;
        if (fillLevel !== undefined) {
          await cap.use((d) => d.fillToLevel(fillLevel));
        } else if (fillPercent !== undefined) {
          await cap.use((d) => d.fillToPercent(fillPercent));
        } else {
          await cap.use((d) => d.fill(fill));
        }
        return {};
      }

      // HumiditySetting
      case 'action.devices.commands.SetHumidity': {
        const { humidity } = command.params;
        await device.capability('HumiditySetting').use((d) => d.setHumidity(humidity));
        return {};
      }
      case 'action.devices.commands.HumidityRelative': {
        const cap = device.capability('HumiditySetting');
        const { humidityRelativePercent, humidityRelativeWeight } = command.params;
        if (humidityRelativePercent !== undefined) {
          await cap.use((d) => d.setHumidityRelativePercent(humidityRelativePercent));
        }
        if (humidityRelativeWeight !== undefined) {
          await cap.use((d) => d.setHumidityRelativeWeight(humidityRelativeWeight));
        }
        return {};
      }

      // InputSelector
      case 'action.devices.commands.SetInput': {
        const { newInput } = command.params;
        await device.capability('InputSelector').use((d) => d.setInput(newInput));
        return {};
      }
      case 'action.devices.commands.NextInput':
        await device.capability('InputSelector').use((d) => d.setNextInput());
        return {};
      case 'action.devices.commands.PreviousInput':
        await device.capability('InputSelector').use((d) => d.setPreviousInput());
        return {};

      // LightEffects
      case 'action.devices.commands.ColorLoop': {
        const { duration } = command.params;
        await device.capability('LightEffects').use((d) => d.setColorLoop(duration));
        return {};
      }
      case 'action.devices.commands.Sleep': {
        const { duration } = command.params;
        await device.capability('LightEffects').use((d) => d.setSleep(duration));
        return {};
      }
      case 'action.devices.commands.Wake': {
        const { duration } = command.params;
        await device.capability('LightEffects').use((d) => d.setWake(duration));
        return {};
      }
      case 'action.devices.commands.StopEffect':
        await device.capability('LightEffects').use((d) => d.stopEffect());
        return {};

      // Locator
      case 'action.devices.commands.Locate': {
        const { silence, lang } = command.params;
        await device.capability('Locator').use((d) => d.locate(silence, lang));
        return {};
      }

      // LockUnlock
      case 'action.devices.commands.LockUnlock': {
        const cap = device.capability('LockUnlock');
        const { lock } = command.params;
        await cap.use((d) => d.setLocked(lock));
        return { isLocked: await cap.use((d) => d.isLocked()) };
      }

      // Modes
      case 'action.devices.commands.SetModes': {
        const cap = device.capability('Modes');
        for (const [modeName, settingName] of Object.entries(command.params.updateModeSettings)) {
          await cap.use((d) => d.updateMode(modeName, settingName));
        }
        return {};
      }

      // NetworkControl
      case 'action.devices.commands.EnableDisableGuestNetwork': {
        const { enable } = command.params;
        await device.capability('NetworkControl').use((d) => d.setGuestNetworkEnabled(enable));
        return {};
      }
      case 'action.devices.commands.EnableDisableNetworkProfile': {
        const { profile, enable } = command.params;
        await device.capability('NetworkControl').use((d) => d.setNetworkProfileEnabled(profile, enable));
        return {};
      }
      case 'action.devices.commands.GetGuestNetworkPassword': {
        const password = await device.capability('NetworkControl').use((d) => d.getGuestNetworkPassword());
        return { guestNetworkPassword: password };
      }
      case 'action.devices.commands.TestNetworkSpeed': {
        const { testDownloadSpeed, testUploadSpeed } = command.params;
        await device
          .capability('NetworkControl')
          .use((d) => d.testNetworkSpeed(testDownloadSpeed, testUploadSpeed));
        return {};
      }

      // OnOff
      case 'action.devices.commands.OnOff': {
        const { on } = command.params;
        await device.capability('OnOff').use((d) => d.setOn(on));
        return {};
      }

      // OpenClose
      case 'action.devices.commands.OpenClose': {
        const { openPercent, openDirection } = command.params;
        await device.capability('OpenClose').use((d) => d.setOpen(openPercent, openDirection));
        return {};
      }
      case 'action.devices.commands.OpenCloseRelative': {
        const { openRelativePercent, openDirection } = command.params;
        await device.capability('OpenClose').use((d) => d.setOpenRelative(openRelativePercent, openDirection));
        return {};
      }

      // Reboot
      case 'action.devices.commands.Reboot':
        await device.capability('Reboot').use((d) => d.reboot());
        return {};

      // Rotation
      case 'action.devices.commands.RotateAbsolute': {
        const cap = device.capability('Rotation');
        const { rotationDegrees, rotationPercent } = command.params;
        if (rotationDegrees !== undefined) await cap.use((d) => d.setRotationDegrees(rotationDegrees));
        if (rotationPercent !== undefined) await cap.use((d) => d.setRotationPercent(rotationPercent));
        return {};
      }

      // Scene
      case 'action.devices.commands.ActivateScene': {
        const cap = device.capability('Scene');
        if (command.params.deactivate) {
          await cap.use((d) => d.deactivate());
        } else {
          await cap.use((d) => d.activate());
        }
        return {};
      }

      // SoftwareUpdate
      case 'action.devices.commands.SoftwareUpdate':
        await device.capability('SoftwareUpdate').use((d) => d.performUpdate());
        return {};

      // StartStop
      case 'action.devices.commands.StartStop': {
        const { start, zone, multipleZones } = command.params;
        const zones = multipleZones ?? (zone !== undefined ? [zone] : undefined);
        await device.capability('StartStop').use((d) => d.startStop(start, zones));
        return {};
      }
      case 'action.devices.commands.PauseUnpause': {
        const { pause } = command.params;
        await device.capability('StartStop').use((d) => d.pauseUnpause(pause));
        return {};
      }

      // TemperatureControl
      case 'action.devices.commands.SetTemperature': {
        const { temperature } = command.params;
        await device.capability('TemperatureControl').use((d) => d.setTemperature(temperature));
        return {};
      }

      // TemperatureSetting
      case 'action.devices.commands.ThermostatTemperatureSetpoint': {
        const { thermostatTemperatureSetpoint } = command.params;
        await device
          .capability('TemperatureSetting')
          .use((d) => d.setTemperatureSetpoint(thermostatTemperatureSetpoint));
        return {};
      }
      case 'action.devices.commands.ThermostatTemperatureSetRange': {
        const { thermostatTemperatureSetpointHigh, thermostatTemperatureSetpointLow } = command.params;
        await device
          .capability('TemperatureSetting')
          .use((d) => d.setTemperatureSetRange(thermostatTemperatureSetpointHigh, thermostatTemperatureSetpointLow));
        return {};
      }
      case 'action.devices.commands.ThermostatSetMode': {
        const { thermostatMode } = command.params;
        await device.capability('TemperatureSetting').use((d) => d.setThermostatMode(thermostatMode));
        return {};
      }
      case 'action.devices.commands.TemperatureRelative': {
        const cap = device.capability('TemperatureSetting');
        const { thermostatTemperatureRelativeDegree, thermostatTemperatureRelativeWeight } = command.params;
        if (thermostatTemperatureRelativeDegree !== undefined) {
          await cap.use((d) => d.setTemperatureRelativeDegree(thermostatTemperatureRelativeDegree));
        }
        if (thermostatTemperatureRelativeWeight !== undefined) {
          await cap.use((d) => d.setTemperatureRelativeWeight(thermostatTemperatureRelativeWeight));
        }
        return {};
      }

      // Timer
      case 'action.devices.commands.TimerStart': {
        const { timerTimeSec } = command.params;
        await device.capability('Timer').use((d) => d.startTimer(timerTimeSec));
        return {};
      }
      case 'action.devices.commands.TimerAdjust': {
        const { timerTimeSec } = command.params;
        await device.capability('Timer').use((d) => d.adjustTimer(timerTimeSec));
        return {};
      }
      case 'action.devices.commands.TimerPause':
        await device.capability('Timer').use((d) => d.pauseTimer());
        return {};
      case 'action.devices.commands.TimerResume':
        await device.capability('Timer').use((d) => d.resumeTimer());
        return {};
      case 'action.devices.commands.TimerCancel':
        await device.capability('Timer').use((d) => d.cancelTimer());
        return {};

      // Toggles
      case 'action.devices.commands.SetToggles': {
        const cap = device.capability('Toggles');
        for (const [name, value] of Object.entries(command.params.updateToggleSettings)) {
          await cap.use((d) => d.setToggle(name, value));
        }
        return {};
      }

      // TransportControl
      case 'action.devices.commands.mediaStop':
        await device.capability('TransportControl').use((d) => d.mediaStop());
        return {};
      case 'action.devices.commands.mediaNext':
        await device.capability('TransportControl').use((d) => d.mediaNext());
        return {};
      case 'action.devices.commands.mediaPrevious':
        await device.capability('TransportControl').use((d) => d.mediaPrevious());
        return {};
      case 'action.devices.commands.mediaPause':
        await device.capability('TransportControl').use((d) => d.mediaPause());
        return {};
      case 'action.devices.commands.mediaResume':
        await device.capability('TransportControl').use((d) => d.mediaResume());
        return {};
      case 'action.devices.commands.mediaSeekRelative': {
        const { relativePositionMs } = command.params;
        await device.capability('TransportControl').use((d) => d.mediaSeekRelative(relativePositionMs));
        return {};
      }
      case 'action.devices.commands.mediaSeekToPosition': {
        const { absPositionMs } = command.params;
        await device.capability('TransportControl').use((d) => d.mediaSeekToPosition(absPositionMs));
        return {};
      }
      case 'action.devices.commands.mediaRepeatMode': {
        const { isOn, isSingle } = command.params;
        await device.capability('TransportControl').use((d) => d.mediaRepeatMode(isOn, isSingle));
        return {};
      }
      case 'action.devices.commands.mediaShuffle':
        await device.capability('TransportControl').use((d) => d.mediaShuffle());
        return {};
      case 'action.devices.commands.mediaClosedCaptioningOn': {
        const { closedCaptioningLanguage, userQueryLanguage } = command.params;
        await device
          .capability('TransportControl')
          .use((d) => d.mediaClosedCaptioningOn(closedCaptioningLanguage, userQueryLanguage));
        return {};
      }
      case 'action.devices.commands.mediaClosedCaptioningOff':
        await device.capability('TransportControl').use((d) => d.mediaClosedCaptioningOff());
        return {};

      // Volume
      case 'action.devices.commands.mute': {
        const { mute } = command.params;
        await device.capability('Volume').use((d) => d.mute(mute));
        return {};
      }
      case 'action.devices.commands.setVolume': {
        const { volumeLevel } = command.params;
        await device.capability('Volume').use((d) => d.setVolume(volumeLevel));
        return {};
      }
      case 'action.devices.commands.volumeRelative': {
        const { relativeSteps } = command.params;
        await device.capability('Volume').use((d) => d.setVolumeRelative(relativeSteps));
        return {};
      }

      default: {
        const unknown: never = command;
        throw new Error(`Unknown device command: ${JSON.stringify(unknown)}`);
      }
    }
  }
}
