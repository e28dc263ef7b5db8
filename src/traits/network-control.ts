/**
 * NetworkControl: routers and other devices that report network data
 * and run network operations (guest network, profiles, speed tests).
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { GenericErrorCode } from '../errors';
import type { Awaitable } from './common';
import { compact } from './trait-definition';
import type { TraitDefinition } from './trait-definition';

export interface NetworkSettings {
  ssid: string;
}

export type SpeedTestStatus = 'SUCCESS' | 'FAILURE';

export interface DownloadSpeedTestResult {
  downloadSpeedMbps: number;
  unixTimestampSec: number;
  status: SpeedTestStatus;
}

export interface UploadSpeedTestResult {
  uploadSpeedMbps: number;
  unixTimestampSec: number;
  status: SpeedTestStatus;
}

export interface NetworkProfileState {
  enabled: boolean;
}

export type NetworkControlErrorCode =
  | 'networkProfileNotRecognized'
  | 'networkSpeedTestInProgress'
  | GenericErrorCode;

export interface NetworkControl {
  supportsEnablingGuestNetwork?(): Awaitable<boolean | undefined>;
  supportsDisablingGuestNetwork?(): Awaitable<boolean | undefined>;
  supportsGettingGuestNetworkPassword?(): Awaitable<boolean | undefined>;
  supportsEnablingNetworkProfile?(): Awaitable<boolean | undefined>;
  supportsDisablingNetworkProfile?(): Awaitable<boolean | undefined>;
  supportsNetworkDownloadSpeedTest?(): Awaitable<boolean | undefined>;
  supportsNetworkUploadSpeedTest?(): Awaitable<boolean | undefined>;
  getNetworkProfiles?(): Awaitable<string[] | undefined>;

  isNetworkEnabled(): Awaitable<boolean>;
  getNetworkSettings(): Awaitable<NetworkSettings>;
  isGuestNetworkEnabled(): Awaitable<boolean>;
  getGuestNetworkSettings(): Awaitable<NetworkSettings>;
  getNumConnectedDevices(): Awaitable<number>;
  /** Usage in the current billing period. */
  getNetworkUsageMb(): Awaitable<number>;
  getNetworkUsageLimitMb(): Awaitable<number>;
  /** When true the usage limit is ignored. */
  isNetworkUsageUnlimited(): Awaitable<boolean>;
  getLastNetworkDownloadSpeedTest(): Awaitable<DownloadSpeedTestResult>;
  getLastNetworkUploadSpeedTest(): Awaitable<UploadSpeedTestResult>;
  isNetworkSpeedTestInProgress?(): Awaitable<boolean | undefined>;
  /** Keyed by profile name from `getNetworkProfiles`. */
  getNetworkProfilesState(): Awaitable<Record<string, NetworkProfileState>>;

  setGuestNetworkEnabled(enable: boolean): Awaitable<void>;
  setNetworkProfileEnabled(profile: string, enable: boolean): Awaitable<void>;
  getGuestNetworkPassword(): Awaitable<string>;
  testNetworkSpeed(download: boolean, upload: boolean): Awaitable<void>;
}

export const networkControlTrait: TraitDefinition<NetworkControl> = {
  async attributes(cap: DeviceHandle<NetworkControl>) {
    return compact({
      networkProfiles: await cap.use((d) => d.getNetworkProfiles?.()),
      supportsEnablingGuestNetwork: await cap.use((d) => d.supportsEnablingGuestNetwork?.()),
      supportsDisablingGuestNetwork: await cap.use((d) => d.supportsDisablingGuestNetwork?.()),
      supportsGettingGuestNetworkPassword: await cap.use((d) => d.supportsGettingGuestNetworkPassword?.()),
      supportsEnablingNetworkProfile: await cap.use((d) => d.supportsEnablingNetworkProfile?.()),
      supportsDisablingNetworkProfile: await cap.use((d) => d.supportsDisablingNetworkProfile?.()),
      supportsNetworkDownloadSpeedTest: await cap.use((d) => d.supportsNetworkDownloadSpeedTest?.()),
      supportsNetworkUploadSpeedTest: await cap.use((d) => d.supportsNetworkUploadSpeedTest?.()),
    });
  },
  async states(cap: DeviceHandle<NetworkControl>) {
    return compact({
      networkEnabled: await cap.use((d) => d.isNetworkEnabled()),
      networkSettings: await cap.use((d) => d.getNetworkSettings()),
      guestNetworkEnabled: await cap.use((d) => d.isGuestNetworkEnabled()),
      guestNetworkSettings: await cap.use((d) => d.getGuestNetworkSettings()),
      numConnectedDevices: await cap.use((d) => d.getNumConnectedDevices()),
      networkUsageMB: await cap.use((d) => d.getNetworkUsageMb()),
      networkUsageLimitMB: await cap.use((d) => d.getNetworkUsageLimitMb()),
      networkUsageUnlimited: await cap.use((d) => d.isNetworkUsageUnlimited()),
      lastNetworkDownloadSpeedTest: await cap.use((d) => d.getLastNetworkDownloadSpeedTest()),
      lastNetworkUploadSpeedTest: await cap.use((d) => d.getLastNetworkUploadSpeedTest()),
      networkSpeedTestInProgress: await cap.use((d) => d.isNetworkSpeedTestInProgress?.()),
      networkProfilesState: await cap.use((d) => d.getNetworkProfilesState()),
    });
  },
};
