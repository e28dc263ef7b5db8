import pino from 'pino';
import { Device } from '../../src/devices';
import type { DeviceInfo, DeviceName, SmartHomeDevice } from '../../src/devices';
import { DeviceError, DeviceServerError } from '../../src/errors';
import type {
  ArmDisarm,
  ArmLevel,
  AvailableMode,
  Brightness,
  DownloadSpeedTestResult,
  LockUnlock,
  LockUnlockErrorCode,
  Modes,
  NetworkControl,
  NetworkProfileState,
  NetworkSettings,
  OnOff,
  UploadSpeedTestResult,
} from '../../src/traits';

export const silentLogger = pino({ level: 'silent' });

/** A wall switch with a dimmer and a door lock, all in one box. */
export class TestSwitch implements SmartHomeDevice, OnOff, Brightness, LockUnlock {
  on = false;
  brightness = 50;
  locked = false;
  online = true;
  disconnected = false;
  failQuery = false;
  lockError?: LockUnlockErrorCode;
  readonly calls: string[] = [];

  constructor(private readonly label = 'Hallway switch') {}

  getDeviceInfo(): DeviceInfo {
    return { manufacturer: 'Test Works', model: 'TS-1', hwVersion: '1.0', swVersion: '2.3.1' };
  }

  getDeviceName(): DeviceName {
    return { name: this.label, defaultNames: ['TS-1 switch'], nicknames: ['hall light'] };
  }

  getRoomHint(): string {
    return 'Hallway';
  }

  willReportState(): boolean {
    return false;
  }

  isOnline(): boolean {
    return this.online;
  }

  disconnect(): void {
    this.disconnected = true;
  }

  // OnOff
  isOn(): boolean {
    this.calls.push('isOn');
    if (this.failQuery) throw new DeviceServerError('bus timeout');
    return this.on;
  }

  setOn(on: boolean): void {
    this.calls.push(`setOn:${on}`);
    this.on = on;
  }

  // Brightness
  isCommandOnlyBrightness(): boolean {
    return false;
  }

  getBrightness(): number {
    this.calls.push('getBrightness');
    return this.brightness;
  }

  setBrightnessAbsolute(brightness: number): void {
    this.calls.push(`setBrightnessAbsolute:${brightness}`);
    this.brightness = brightness;
  }

  setBrightnessRelativePercent(percent: number): void {
    this.calls.push(`setBrightnessRelativePercent:${percent}`);
    this.brightness += percent;
  }

  setBrightnessRelativeWeight(weight: number): void {
    this.calls.push(`setBrightnessRelativeWeight:${weight}`);
    this.brightness += weight * 10;
  }

  // LockUnlock
  isLocked(): boolean {
    return this.locked;
  }

  isJammed(): boolean {
    return false;
  }

  setLocked(lock: boolean): void {
    if (this.lockError) throw new DeviceError<LockUnlockErrorCode>(this.lockError);
    this.locked = lock;
  }
}

export function makeOnOffDevice(id = 'switch-1', impl = new TestSwitch()): Device<TestSwitch> {
  return new Device(impl, 'SWITCH', id).register('OnOff');
}

/** A security panel with a guest network and washer-style modes bolted on. */
export class TestPanel implements SmartHomeDevice, ArmDisarm, Modes, NetworkControl {
  readonly calls: string[] = [];
  armed = false;
  level = 'home';
  readonly modes: Record<string, string> = { load: 'small' };

  getDeviceInfo(): DeviceInfo {
    return { manufacturer: 'Test Works', model: 'TP-9', hwVersion: '3', swVersion: '0.9' };
  }

  getDeviceName(): DeviceName {
    return { name: 'Front panel', defaultNames: [], nicknames: [] };
  }

  willReportState(): boolean {
    return true;
  }

  isOnline(): boolean {
    return true;
  }

  // ArmDisarm
  getAvailableArmLevels(): ArmLevel[] {
    return [
      { level_name: 'home', level_values: [{ level_synonym: ['home', 'stay'], lang: 'en' }] },
      { level_name: 'away', level_values: [{ level_synonym: ['away'], lang: 'en' }] },
    ];
  }

  isOrdered(): boolean {
    return true;
  }

  isArmed(): boolean {
    return this.armed;
  }

  currentArmLevel(): string {
    return this.level;
  }

  exitAllowance(): number {
    return 60;
  }

  arm(arm: boolean): void {
    this.calls.push(`arm:${arm}`);
    this.armed = arm;
  }

  cancelArm(): void {
    this.calls.push('cancelArm');
  }

  armWithLevel(arm: boolean, level: string): void {
    this.calls.push(`armWithLevel:${arm}:${level}`);
    this.armed = arm;
    this.level = level;
  }

  // Modes
  getAvailableModes(): AvailableMode[] {
    return [];
  }

  getCurrentModeSettings(): Record<string, string> {
    return { ...this.modes };
  }

  updateMode(modeName: string, settingName: string): void {
    this.calls.push(`updateMode:${modeName}:${settingName}`);
    this.modes[modeName] = settingName;
  }

  // NetworkControl
  isNetworkEnabled(): boolean {
    return true;
  }

  getNetworkSettings(): NetworkSettings {
    return { ssid: 'test-net' };
  }

  isGuestNetworkEnabled(): boolean {
    return false;
  }

  getGuestNetworkSettings(): NetworkSettings {
    return { ssid: 'test-guest' };
  }

  getNumConnectedDevices(): number {
    return 3;
  }

  getNetworkUsageMb(): number {
    return 12;
  }

  getNetworkUsageLimitMb(): number {
    return 1000;
  }

  isNetworkUsageUnlimited(): boolean {
    return false;
  }

  getLastNetworkDownloadSpeedTest(): DownloadSpeedTestResult {
    return { downloadSpeedMbps: 100, unixTimestampSec: 1700000000, status: 'SUCCESS' };
  }

  getLastNetworkUploadSpeedTest(): UploadSpeedTestResult {
    return { uploadSpeedMbps: 20, unixTimestampSec: 1700000000, status: 'SUCCESS' };
  }

  getNetworkProfilesState(): Record<string, NetworkProfileState> {
    return {};
  }

  setGuestNetworkEnabled(enable: boolean): void {
    this.calls.push(`setGuestNetworkEnabled:${enable}`);
  }

  setNetworkProfileEnabled(profile: string, enable: boolean): void {
    this.calls.push(`setNetworkProfileEnabled:${profile}:${enable}`);
  }

  getGuestNetworkPassword(): string {
    this.calls.push('getGuestNetworkPassword');
    return 'guest-pass';
  }

  testNetworkSpeed(download: boolean, upload: boolean): void {
    this.calls.push(`testNetworkSpeed:${download}:${upload}`);
  }
}
