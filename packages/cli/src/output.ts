/**
 * Terminal output for the CLI
 */

import chalk from 'chalk';
import {
  AdbcamError,
  ExitCode,
  RunOutcome,
  SessionConfiguration,
  errorMessage,
  formatResolution,
} from '@adbcam/core';
import type { AndroidDevice, CameraInfo } from '@adbcam/android';

const RULE = '━'.repeat(40);

export function printBanner(): void {
  console.log();
  console.log(chalk.bold.cyan('adbcam: Android camera as a Linux webcam'));
  console.log(chalk.gray(RULE));
  console.log();
}

export function printSummary(
  config: SessionConfiguration,
  device: AndroidDevice,
  camera: CameraInfo
): void {
  console.log();
  console.log(chalk.bold('Session'));
  console.log(`  ${chalk.gray('Device:')}     ${device.serial} (${device.model})`);
  console.log(`  ${chalk.gray('Camera:')}     ${camera.id} (${camera.facing})`);
  console.log(`  ${chalk.gray('Resolution:')} ${formatResolution(config.resolution)}`);
  console.log(`  ${chalk.gray('Frame rate:')} ${config.fps} fps`);
  console.log(`  ${chalk.gray('Microphone:')} ${config.audioSource}`);
  console.log();
}

/**
 * Troubleshooting hints carried in an error's details
 */
export function hintsOf(error: unknown): string[] {
  if (!(error instanceof AdbcamError)) {
    return [];
  }
  const hints = error.details?.hints;
  return Array.isArray(hints) ? hints.filter((hint): hint is string => typeof hint === 'string') : [];
}

export function printError(error: unknown): void {
  console.error(chalk.red(`✗ ${errorMessage(error)}`));
  const hints = hintsOf(error);
  if (hints.length > 0) {
    console.error(chalk.yellow('Please check that:'));
    for (const hint of hints) {
      console.error(chalk.yellow(`  - ${hint}`));
    }
  }
}

export function describeOutcome(outcome: RunOutcome): string {
  switch (outcome.reason) {
    case 'interrupted':
      return 'Stopped by user';
    case 'device-disconnected':
      return 'Device disconnected';
    case 'mirror-exited': {
      const exit = outcome.mirrorExit;
      if (exit?.signal) {
        return `scrcpy was terminated by ${exit.signal}`;
      }
      return `scrcpy exited with code ${exit?.code ?? 'unknown'}`;
    }
    case 'acquisition-failed':
      return `Setup failed: ${outcome.error?.message ?? 'unknown error'}`;
  }
}

export function printOutcome(outcome: RunOutcome): void {
  console.log(chalk.gray(RULE));

  const summary = describeOutcome(outcome);
  if (outcome.exitCode === ExitCode.Success) {
    console.log(chalk.green(`✓ ${summary}`));
  } else if (outcome.reason === 'acquisition-failed' && outcome.error) {
    printError(outcome.error);
  } else {
    console.log(chalk.yellow(`⚠ ${summary}`));
  }

  if (outcome.released.length > 0) {
    console.log(chalk.gray(`Released: ${outcome.released.join(', ')}`));
  }
  for (const failure of outcome.releaseErrors) {
    console.error(chalk.red(`✗ ${failure.message}`));
  }
  if (outcome.releaseErrors.length > 0) {
    console.error(chalk.red('Some resources could not be released and may need manual cleanup.'));
  }
}
