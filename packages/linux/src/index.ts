/**
 * @adbcam/linux
 * Virtual camera (v4l2loopback) and virtual microphone (pactl) provisioning
 */

export {
  V4l2LoopbackProvisioner,
  parseVideoNumber,
} from './v4l2loopback';
export type { V4l2LoopbackOptions } from './v4l2loopback';

export {
  PulseAudioProvisioner,
  parseModuleIndex,
  parseSinkNames,
  microphoneName,
} from './pulse-audio';
export type { PulseAudioOptions } from './pulse-audio';

export { linuxConfig } from './config';
export type { LinuxConfig } from './config';
