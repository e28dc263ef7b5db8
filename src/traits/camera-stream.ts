/**
 * CameraStream: devices that can stream a video feed to third-party
 * screens, Chromecast-connected screens or smartphones.
 *
 * A WebRTC stream is described by a signaling URL (plus optional offer
 * SDP and ICE servers); every other protocol by an access URL and an
 * optional Cast receiver app id.
 */

import type { DeviceHandle } from '../devices/device-handle';
import type { Awaitable } from './common';
import type { TraitDefinition } from './trait-definition';

export const CAMERA_STREAM_PROTOCOLS = [
  'hls',
  'dash',
  'smooth_stream',
  'progressive_mp4',
  'webRTC',
] as const;

export type CameraStreamProtocol = (typeof CAMERA_STREAM_PROTOCOLS)[number];

export interface WebRtcStreamAccess {
  cameraStreamSignalingUrl: string;
  cameraStreamOffer?: string;
  /** Encoded JSON describing the RTCIceServer entries. */
  cameraStreamIceServers?: string;
}

export interface UrlStreamAccess {
  cameraStreamAccessUrl: string;
  /** Cast receiver used when streaming to Chromecast. */
  cameraStreamReceiverAppId?: string;
}

export type CameraStreamDescriptor = {
  /** Token the receiver presents to access the stream. */
  cameraStreamAuthToken?: string;
  cameraStreamProtocol: CameraStreamProtocol;
} & (WebRtcStreamAccess | UrlStreamAccess);

export interface CameraStream {
  getSupportedCameraStreamProtocols(): Awaitable<CameraStreamProtocol[]>;
  /** Whether `cameraStreamAuthToken` will be provided for the target surface. */
  needAuthToken(): Awaitable<boolean>;
  getCameraStream(
    toChromecast: boolean,
    supportedProtocols: CameraStreamProtocol[],
  ): Awaitable<CameraStreamDescriptor>;
}

export const cameraStreamTrait: TraitDefinition<CameraStream> = {
  async attributes(cap: DeviceHandle<CameraStream>) {
    return {
      cameraStreamSupportedProtocols: await cap.use((d) => d.getSupportedCameraStreamProtocols()),
      cameraStreamNeedAuthToken: await cap.use((d) => d.needAuthToken()),
    };
  },
};
