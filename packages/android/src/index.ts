/**
 * @adbcam/android
 * Android device discovery via TangoADB and camera mirroring via scrcpy
 */

export {
  AndroidDeviceService,
  androidDeviceService,
  validateSerial,
  CONNECTION_HINTS,
} from './device-service';
export type { AndroidDevice, AdbDeviceSource } from './device-service';

export {
  CameraService,
  parseCameraSizes,
} from './camera-service';
export type { CameraInfo } from './camera-service';

export {
  ScrcpyMirrorLauncher,
  MirrorSession,
  scrcpyMirrorLauncher,
  buildMirrorArgs,
  buildMirrorEnv,
} from './scrcpy-mirror';
export type { MirrorChild, SpawnMirror, ScrcpyMirrorOptions } from './scrcpy-mirror';

export { classifyOutputLine, monitorOutput } from './output-monitor';
export type { OutputLineKind } from './output-monitor';

export { MIC_SOURCES, DEFAULT_MIC_SOURCE, isAudioSourceChoice } from './mic-sources';
export type { MicSourceInfo } from './mic-sources';

export { androidConfig } from './config';
export type { AndroidConfig } from './config';
