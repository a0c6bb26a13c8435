/**
 * Discovery, selection and the session run, wired together
 */

import chalk from 'chalk';
import {
  ExecFileRunner,
  ExitCode,
  InterruptController,
  InterruptSource,
  ResourceLifecycleManager,
  RunOutcome,
  SessionConfiguration,
  coreConfig,
} from '@adbcam/core';
import {
  CameraService,
  androidConfig,
  androidDeviceService,
  scrcpyMirrorLauncher,
} from '@adbcam/android';
import type { AndroidDevice } from '@adbcam/android';
import { PulseAudioProvisioner, V4l2LoopbackProvisioner } from '@adbcam/linux';
import { printBanner, printError, printOutcome } from './output';
import { InquirerPrompter, SessionSelector } from './selection';
import { DevicePresence, ensureDevicePresent } from './session';

export interface InterruptHandle extends InterruptSource {
  install(): void;
  dispose(): void;
}

export interface CliDependencies {
  interrupts: InterruptHandle;
  devices: DevicePresence & {
    listReadyDevices(): Promise<AndroidDevice[]>;
  };
  selector: {
    select(devices: AndroidDevice[]): Promise<SessionConfiguration | null>;
  };
  createSession(interrupts: InterruptSource): {
    run(config: SessionConfiguration): Promise<RunOutcome>;
  };
}

/**
 * @inquirer/prompts rejects with ExitPromptError on Ctrl+C
 */
export function isPromptCancel(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

export function createDefaultDependencies(): CliDependencies {
  const runner = new ExecFileRunner(coreConfig.commandTimeout);

  return {
    interrupts: new InterruptController(),
    devices: androidDeviceService,
    selector: new SessionSelector(new InquirerPrompter(), new CameraService(runner)),
    createSession: (interrupts) =>
      new ResourceLifecycleManager({
        video: new V4l2LoopbackProvisioner(runner),
        audio: new PulseAudioProvisioner(runner),
        mirror: scrcpyMirrorLauncher,
        interrupts,
        releaseTimeoutMs: coreConfig.releaseTimeout,
        mirrorStopTimeoutMs: androidConfig.stopTimeout,
      }),
  };
}

/**
 * Run one session end to end and return the process exit code
 */
export async function runCli(deps: CliDependencies = createDefaultDependencies()): Promise<ExitCode> {
  const { interrupts } = deps;
  interrupts.install();

  try {
    printBanner();

    const devices = await deps.devices.listReadyDevices();
    if (interrupts.interrupted) {
      return ExitCode.Success;
    }

    const config = await deps.selector.select(devices);
    if (!config || interrupts.interrupted) {
      console.log(chalk.yellow('Cancelled, nothing was set up.'));
      return ExitCode.Success;
    }

    await ensureDevicePresent(deps.devices, config.serial);

    console.log(chalk.cyan('Setting up the virtual webcam. Press Ctrl+C to stop.'));
    const outcome = await deps.createSession(interrupts).run(config);
    printOutcome(outcome);
    return outcome.exitCode;
  } catch (error) {
    if (isPromptCancel(error)) {
      console.log(chalk.yellow('Cancelled, nothing was set up.'));
      return ExitCode.Success;
    }
    printError(error);
    return ExitCode.Failure;
  } finally {
    interrupts.dispose();
  }
}
