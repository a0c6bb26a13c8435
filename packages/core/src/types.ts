/**
 * Core types for the webcam session
 * Shared across all @adbcam packages
 */

/**
 * Android microphone sources understood by scrcpy's --audio-source
 */
export type MicSource =
  | 'mic'
  | 'mic-unprocessed'
  | 'mic-camcorder'
  | 'mic-voice-recognition'
  | 'mic-voice-communication';

/**
 * Selected audio source, or 'none' to run video only
 */
export type AudioSourceChoice = MicSource | 'none';

export interface Resolution {
  width: number;
  height: number;
}

/**
 * Choices collected from the user, frozen once selection finishes
 */
export interface SessionConfiguration {
  readonly serial: string;
  readonly cameraId: string;
  readonly resolution: Readonly<Resolution>;
  readonly fps: number;
  readonly audioSource: AudioSourceChoice;
}

/**
 * External resources held during a session
 */
export type ResourceKind =
  | 'virtual_video_device'
  | 'virtual_audio_sink'
  | 'virtual_audio_loopback'
  | 'mirror_process';

export type ReleaseAction = () => Promise<void>;

/**
 * A resource recorded on the stack after it was successfully created
 */
export interface AllocatedResource {
  kind: ResourceKind;
  /** Identifier returned by the provisioning call (device path, module index, pid) */
  handle: string;
  /** Name other components bind to (device path, sink name, source name) */
  target: string;
  label: string;
  release: ReleaseAction;
}

/**
 * How the mirror process came to an end
 */
export interface MirrorExit {
  reason: 'exited' | 'device-disconnected';
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Handle on a running mirror process
 */
export interface MirrorProcess {
  pid: number;
  /** Settles once, when the process exits or loses its device */
  exited: Promise<MirrorExit>;
  /** SIGTERM, escalating to SIGKILL after the timeout */
  stop(timeoutMs?: number): Promise<void>;
}

/**
 * What the mirror process is bound to
 */
export interface MirrorBindings {
  videoDevicePath: string;
  audioSinkName?: string;
}

export type StopReason =
  | 'interrupted'
  | 'mirror-exited'
  | 'device-disconnected'
  | 'acquisition-failed';

export enum ExitCode {
  Success = 0,
  Failure = 1,
  CleanupFailed = 2,
  MirrorLost = 3,
}

export function formatResolution(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`;
}

export function parseResolution(value: string): Resolution | null {
  const match = value.trim().match(/^(\d+)x(\d+)$/);
  if (!match) {
    return null;
  }
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}
