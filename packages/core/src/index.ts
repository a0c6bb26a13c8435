/**
 * @adbcam/core
 * Session types, errors and the resource lifecycle manager
 */

// Types
export type {
  MicSource,
  AudioSourceChoice,
  Resolution,
  SessionConfiguration,
  ResourceKind,
  ReleaseAction,
  AllocatedResource,
  MirrorExit,
  MirrorProcess,
  MirrorBindings,
  StopReason,
} from './types';
export { ExitCode, formatResolution, parseResolution } from './types';

// Errors
export {
  AdbcamErrorCode,
  AdbcamError,
  NoDevicesFoundError,
  ValidationError,
  ProvisioningError,
  LaunchError,
  ReleaseError,
  errorMessage,
  toAdbcamError,
} from './errors';

// Interfaces
export type {
  VideoDeviceProvisioner,
  AudioProvisioner,
  MirrorLauncher,
} from './interfaces';
export { BaseProvisioner } from './interfaces';

// Lifecycle
export type {
  LifecycleManagerOptions,
  TeardownReport,
  RunOutcome,
} from './lifecycle-manager';
export { ResourceLifecycleManager } from './lifecycle-manager';
export { ResourceStack } from './resource-stack';
export type { InterruptSource, SignalTarget } from './interrupt';
export { InterruptController } from './interrupt';

// Utilities
export type { CommandResult, CommandOptions, CommandRunner } from './command-runner';
export { ExecFileRunner, CommandFailedError, NO_TIMEOUT } from './command-runner';
export { AsyncMutex } from './mutex';
export { withTimeout } from './timeout';
export { coreConfig, parseIntEnv, parseStringEnv, parseBoolEnv } from './config';
export type { CoreConfig } from './config';
