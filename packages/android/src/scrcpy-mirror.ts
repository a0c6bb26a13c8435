/**
 * scrcpy mirror process
 * Streams the phone camera into the v4l2 sink and its microphone into the audio sink
 */

import { spawn, SpawnOptions } from 'child_process';
import type { Readable } from 'stream';
import {
  LaunchError,
  MirrorBindings,
  MirrorExit,
  MirrorLauncher,
  MirrorProcess,
  SessionConfiguration,
  errorMessage,
  formatResolution,
} from '@adbcam/core';
import { androidConfig } from './config';
import { validateSerial } from './device-service';
import { monitorOutput, OutputLineKind } from './output-monitor';

const CAMERA_ID_PATTERN = /^\d+$/;
const KILL_WAIT_MS = 1000;

/**
 * The part of ChildProcess the mirror session uses
 */
export interface MirrorChild {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnMirror = (command: string, args: string[], options: SpawnOptions) => MirrorChild;

export interface ScrcpyMirrorOptions {
  scrcpyBin: string;
  port: number;
  startupGraceMs: number;
  stopTimeoutMs: number;
  spawn: SpawnMirror;
}

const defaultOptions: ScrcpyMirrorOptions = {
  scrcpyBin: androidConfig.scrcpyBin,
  port: androidConfig.scrcpyPort,
  startupGraceMs: androidConfig.startupGrace,
  stopTimeoutMs: androidConfig.stopTimeout,
  spawn: (command, args, options) => spawn(command, args, options),
};

/**
 * scrcpy arguments for a camera session bound to the acquired devices
 */
export function buildMirrorArgs(
  config: SessionConfiguration,
  bindings: MirrorBindings,
  port: number
): string[] {
  validateSerial(config.serial);
  if (!CAMERA_ID_PATTERN.test(config.cameraId)) {
    throw new LaunchError(`Invalid camera id: ${config.cameraId}`);
  }

  const args = [
    `--serial=${config.serial}`,
    '--video-source=camera',
    `--camera-id=${config.cameraId}`,
    `--camera-size=${formatResolution(config.resolution)}`,
    `--camera-fps=${config.fps}`,
    `--v4l2-sink=${bindings.videoDevicePath}`,
    '--no-window',
    `--port=${port}`,
  ];

  if (config.audioSource === 'none' || !bindings.audioSinkName) {
    args.push('--no-audio');
  } else {
    args.push(`--audio-source=${config.audioSource}`);
  }

  return args;
}

/**
 * Environment routing scrcpy's audio playback into the virtual sink
 */
export function buildMirrorEnv(
  bindings: MirrorBindings,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  if (!bindings.audioSinkName) {
    return base;
  }
  return {
    ...base,
    SDL_AUDIODRIVER: 'pulse',
    PULSE_SINK: bindings.audioSinkName,
  };
}

/**
 * A running scrcpy process
 */
export class MirrorSession implements MirrorProcess {
  readonly pid: number;
  readonly exited: Promise<MirrorExit>;
  private exitInfo: MirrorExit | null = null;
  private spawnError: Error | null = null;
  private lastError: string | null = null;
  private processGone = false;
  private settle: (exit: MirrorExit) => void = () => undefined;
  private readonly exitWaiters: Array<() => void> = [];

  constructor(
    private readonly child: MirrorChild,
    private readonly stopTimeoutMs: number
  ) {
    this.pid = child.pid ?? -1;
    this.exited = new Promise((resolve) => {
      this.settle = resolve;
    });

    child.once('exit', (code, signal) => {
      console.log(`[ScrcpyMirror] scrcpy (pid ${this.pid}) exited with code ${code}, signal ${signal}`);
      this.markExited({ reason: 'exited', code, signal });
    });

    // Also emitted when kill() fails; only a child without a pid never started
    child.on('error', (error) => {
      console.error(`[ScrcpyMirror] scrcpy process error:`, error.message);
      if (child.pid !== undefined) {
        return;
      }
      this.spawnError = error;
      this.markExited({ reason: 'exited', code: null, signal: null });
    });

    if (child.stdout) {
      monitorOutput(child.stdout, (kind, line) => this.onOutput(kind, line));
    }
    if (child.stderr) {
      monitorOutput(child.stderr, (kind, line) => this.onOutput(kind, line));
    }
  }

  /**
   * Resolve once scrcpy has stayed up for the grace period
   * Rejects with LaunchError if it fails to spawn or exits before then
   */
  async waitUntilStarted(graceMs: number): Promise<void> {
    const ended = await this.waitForExit(graceMs);
    if (!ended) {
      return;
    }

    if (this.spawnError) {
      throw new LaunchError(`Failed to start scrcpy: ${this.spawnError.message}`);
    }

    if (this.exitInfo?.reason === 'device-disconnected') {
      throw new LaunchError(`Device lost while scrcpy was starting: ${this.lastError}`);
    }

    const detail = this.lastError ? `: ${this.lastError}` : '';
    throw new LaunchError(
      `scrcpy exited during startup (code ${this.exitInfo?.code ?? 'unknown'})${detail}`,
      { exit: this.exitInfo }
    );
  }

  /**
   * SIGTERM, then SIGKILL if scrcpy is still up after the timeout
   */
  async stop(timeoutMs: number = this.stopTimeoutMs): Promise<void> {
    if (!this.isProcessAlive()) {
      return;
    }

    console.log(`[ScrcpyMirror] Stopping scrcpy (pid ${this.pid})`);
    this.child.kill('SIGTERM');
    if (await this.waitForProcessExit(timeoutMs)) {
      return;
    }

    console.warn(`[ScrcpyMirror] scrcpy did not exit within ${timeoutMs}ms, sending SIGKILL`);
    this.child.kill('SIGKILL');
    if (!(await this.waitForProcessExit(KILL_WAIT_MS))) {
      throw new Error(`scrcpy (pid ${this.pid}) did not exit after SIGKILL`);
    }
  }

  private onOutput(kind: OutputLineKind, line: string): void {
    switch (kind) {
      case 'disconnected':
        console.error(`[ScrcpyMirror] Device disconnected: ${line}`);
        this.lastError = line;
        this.markExited({ reason: 'device-disconnected', code: null, signal: null }, false);
        break;
      case 'error':
        console.error(`[ScrcpyMirror] ${line}`);
        this.lastError = line;
        break;
      case 'warning':
        console.warn(`[ScrcpyMirror] ${line}`);
        break;
      case 'info':
        break;
    }
  }

  /**
   * Record the end of the session; processExited is false when only the device was lost
   */
  private markExited(exit: MirrorExit, processExited = true): void {
    if (processExited) {
      this.processGone = true;
      for (const resolve of this.exitWaiters.splice(0)) {
        resolve();
      }
    }
    if (this.exitInfo) {
      return;
    }
    this.exitInfo = exit;
    this.settle(exit);
  }

  private isProcessAlive(): boolean {
    return !this.processGone && this.child.exitCode === null && this.child.signalCode === null;
  }

  /**
   * True if the session ended (process exit or device loss) within the timeout
   */
  private async waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exitInfo) {
      return true;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const result = await Promise.race([
      this.exited.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      }),
    ]);
    clearTimeout(timer);
    return result;
  }

  /**
   * True if the OS process exited within the timeout
   */
  private async waitForProcessExit(timeoutMs: number): Promise<boolean> {
    if (!this.isProcessAlive()) {
      return true;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const result = await Promise.race([
      new Promise<boolean>((resolve) => {
        this.exitWaiters.push(() => resolve(true));
      }),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      }),
    ]);
    clearTimeout(timer);
    return result;
  }
}

export class ScrcpyMirrorLauncher implements MirrorLauncher {
  private readonly options: ScrcpyMirrorOptions;

  constructor(options: Partial<ScrcpyMirrorOptions> = {}) {
    this.options = { ...defaultOptions, ...options };
  }

  async launch(config: SessionConfiguration, bindings: MirrorBindings): Promise<MirrorProcess> {
    const args = buildMirrorArgs(config, bindings, this.options.port);

    console.log(`[ScrcpyMirror] Starting ${this.options.scrcpyBin} -> ${bindings.videoDevicePath}`);
    console.log(`    Camera: ${config.cameraId}, Resolution: ${formatResolution(config.resolution)}, FPS: ${config.fps}`);
    if (bindings.audioSinkName) {
      console.log(`    Microphone: ${config.audioSource} -> ${bindings.audioSinkName}`);
    }

    let child: MirrorChild;
    try {
      child = this.options.spawn(this.options.scrcpyBin, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: buildMirrorEnv(bindings),
        // Own process group: a terminal Ctrl+C reaches only adbcam, which stops scrcpy during teardown
        detached: true,
      });
    } catch (error) {
      throw new LaunchError(`Failed to start scrcpy: ${errorMessage(error)}`);
    }

    const session = new MirrorSession(child, this.options.stopTimeoutMs);

    try {
      await session.waitUntilStarted(this.options.startupGraceMs);
    } catch (error) {
      // A lost device during startup leaves scrcpy running; it is not recorded, so stop it here
      try {
        await session.stop();
      } catch (stopError) {
        console.error('[ScrcpyMirror] Failed to stop scrcpy after startup failure:', errorMessage(stopError));
      }
      throw error;
    }

    console.log(`[ScrcpyMirror] scrcpy running (pid ${session.pid})`);
    return session;
  }
}

export const scrcpyMirrorLauncher = new ScrcpyMirrorLauncher();
