/**
 * Interfaces between the lifecycle manager and the host/device services
 */

import { ProvisioningError, errorMessage } from './errors';
import { NO_TIMEOUT } from './command-runner';
import type { CommandResult, CommandRunner } from './command-runner';
import type {
  AllocatedResource,
  MirrorBindings,
  MirrorProcess,
  SessionConfiguration,
} from './types';

/**
 * Creates the virtual video device (kernel module instance)
 */
export interface VideoDeviceProvisioner {
  /**
   * Load or reserve the device for the session's resolution
   * Resolves with a resource whose target is the device path
   */
  acquire(config: SessionConfiguration): Promise<AllocatedResource>;
}

/**
 * Creates the virtual audio endpoint on the audio server
 */
export interface AudioProvisioner {
  /**
   * Create the sink the mirror process plays into
   */
  createSink(config: SessionConfiguration): Promise<AllocatedResource>;

  /**
   * Route the sink into a source that applications can pick as a microphone
   */
  createLoopback(config: SessionConfiguration, sink: AllocatedResource): Promise<AllocatedResource>;
}

/**
 * Starts the mirroring subprocess
 */
export interface MirrorLauncher {
  launch(config: SessionConfiguration, bindings: MirrorBindings): Promise<MirrorProcess>;
}

/**
 * Abstract base for provisioners that shell out to system utilities
 * Turns command failures into ProvisioningError
 */
export abstract class BaseProvisioner {
  protected readonly runner: CommandRunner;
  protected readonly name: string;

  constructor(name: string, runner: CommandRunner) {
    this.name = name;
    this.runner = runner;
  }

  /**
   * Acquisition commands run without a time limit (sudo may be waiting for a password)
   */
  protected async runOrFail(
    command: string,
    args: string[],
    failure: string
  ): Promise<CommandResult> {
    try {
      return await this.runner.run(command, args, { timeoutMs: NO_TIMEOUT });
    } catch (error) {
      console.error(`[${this.name}] ${command} ${args.join(' ')} failed:`, errorMessage(error));
      throw new ProvisioningError(`${failure}: ${errorMessage(error)}`, {
        command: [command, ...args].join(' '),
      });
    }
  }

  /**
   * Release actions surface the raw error; the manager turns it into a ReleaseError
   * They keep the runner's default timeout
   */
  protected async runRelease(command: string, args: string[]): Promise<void> {
    await this.runner.run(command, args);
  }
}
