/**
 * Resource lifecycle manager
 *
 * Acquires the virtual video device, the optional audio sink and loopback and
 * the mirror process, in that order, records each on a resource stack and
 * releases them in reverse order however the session ends.
 */

import { AdbcamError, ReleaseError, errorMessage, toAdbcamError } from './errors';
import type { AudioProvisioner, MirrorLauncher, VideoDeviceProvisioner } from './interfaces';
import type { InterruptSource } from './interrupt';
import { AsyncMutex } from './mutex';
import { ResourceStack } from './resource-stack';
import { withTimeout } from './timeout';
import {
  AllocatedResource,
  ExitCode,
  MirrorExit,
  MirrorProcess,
  ResourceKind,
  SessionConfiguration,
  StopReason,
} from './types';

const DEFAULT_RELEASE_TIMEOUT_MS = 10000;

export interface LifecycleManagerOptions {
  video: VideoDeviceProvisioner;
  audio: AudioProvisioner;
  mirror: MirrorLauncher;
  interrupts: InterruptSource;
  /** Bound on each release action */
  releaseTimeoutMs?: number;
  /** Grace period given to the mirror process before SIGKILL */
  mirrorStopTimeoutMs?: number;
}

export interface TeardownReport {
  /** Kinds whose release was issued, in release order */
  released: ResourceKind[];
  errors: ReleaseError[];
}

export interface RunOutcome {
  reason: StopReason;
  exitCode: ExitCode;
  error?: AdbcamError;
  mirrorExit?: MirrorExit;
  released: ResourceKind[];
  releaseErrors: ReleaseError[];
}

interface StopEvent {
  reason: StopReason;
  mirrorExit?: MirrorExit;
}

export class ResourceLifecycleManager {
  private readonly stack = new ResourceStack();
  private readonly teardownLock = new AsyncMutex();
  private readonly video: VideoDeviceProvisioner;
  private readonly audio: AudioProvisioner;
  private readonly mirror: MirrorLauncher;
  private readonly interrupts: InterruptSource;
  private readonly releaseTimeoutMs: number;
  private readonly mirrorStopTimeoutMs?: number;
  private running = false;

  constructor(options: LifecycleManagerOptions) {
    this.video = options.video;
    this.audio = options.audio;
    this.mirror = options.mirror;
    this.interrupts = options.interrupts;
    this.releaseTimeoutMs = options.releaseTimeoutMs ?? DEFAULT_RELEASE_TIMEOUT_MS;
    this.mirrorStopTimeoutMs = options.mirrorStopTimeoutMs;
  }

  /**
   * Load the virtual video device and record it
   */
  async acquireVideoDevice(config: SessionConfiguration): Promise<AllocatedResource> {
    const resource = await this.video.acquire(config);
    this.record(resource);
    return resource;
  }

  /**
   * Create the sink and its loopback, recording each as soon as it exists
   * Records nothing when the session has no audio source
   */
  async acquireAudioSink(config: SessionConfiguration): Promise<AllocatedResource[]> {
    if (config.audioSource === 'none') {
      console.log('[LifecycleManager] No audio source selected, skipping audio sink');
      return [];
    }

    const sink = await this.audio.createSink(config);
    this.record(sink);

    const loopback = await this.audio.createLoopback(config, sink);
    this.record(loopback);

    return [sink, loopback];
  }

  /**
   * Start the mirror process bound to the acquired devices and record it
   */
  async launchMirrorProcess(
    config: SessionConfiguration,
    videoDevicePath: string,
    audioSinkName?: string
  ): Promise<MirrorProcess> {
    const proc = await this.mirror.launch(config, { videoDevicePath, audioSinkName });
    const pid = String(proc.pid);

    this.record({
      kind: 'mirror_process',
      handle: pid,
      target: pid,
      label: `mirror process ${pid}`,
      release: () => proc.stop(this.mirrorStopTimeoutMs),
    });

    return proc;
  }

  /**
   * Acquire everything, block until interrupt or mirror exit, then tear down
   */
  async run(config: SessionConfiguration): Promise<RunOutcome> {
    if (this.running) {
      throw new Error('Session is already running');
    }
    this.running = true;

    try {
      let mirror: MirrorProcess | null;
      try {
        mirror = await this.acquireAll(config);
      } catch (error) {
        // A terminal Ctrl+C also reaches sudo and scrcpy, so their failure follows the interrupt
        if (this.interrupts.interrupted) {
          console.log(`[LifecycleManager] Interrupted during setup (${errorMessage(error)}), rolling back`);
          return this.outcome({ reason: 'interrupted' }, await this.teardown());
        }
        const failure = toAdbcamError(error);
        console.error(`[LifecycleManager] Acquisition failed: ${failure.message}`);
        const report = await this.teardown();
        return this.outcome({ reason: 'acquisition-failed' }, report, failure);
      }

      if (!mirror) {
        console.log('[LifecycleManager] Interrupted during setup, rolling back');
        return this.outcome({ reason: 'interrupted' }, await this.teardown());
      }

      const stop = await this.waitForStop(mirror);
      return this.outcome(stop, await this.teardown());
    } finally {
      this.running = false;
    }
  }

  /**
   * Release every recorded resource, newest first
   * Each entry is attempted exactly once; failures are collected, not thrown
   */
  async teardown(): Promise<TeardownReport> {
    return this.teardownLock.withLock(async () => {
      const report: TeardownReport = { released: [], errors: [] };
      if (this.stack.isEmpty()) {
        return report;
      }

      console.log(`[LifecycleManager] Releasing ${this.stack.size} resource(s)`);

      let resource = this.stack.peek();
      while (resource) {
        const current = resource;
        try {
          await withTimeout(
            current.release(),
            this.releaseTimeoutMs,
            () => new Error(`release did not complete within ${this.releaseTimeoutMs}ms`)
          );
          console.log(`[LifecycleManager] Released ${current.kind} (${current.label})`);
        } catch (error) {
          const failure = new ReleaseError(
            current.kind,
            `Failed to release ${current.label}: ${errorMessage(error)}`,
            { handle: current.handle }
          );
          console.error(`[LifecycleManager] ${failure.message}`);
          report.errors.push(failure);
        } finally {
          this.stack.pop();
          report.released.push(current.kind);
        }
        resource = this.stack.peek();
      }

      return report;
    });
  }

  getResources(): readonly AllocatedResource[] {
    return this.stack.snapshot();
  }

  /**
   * Returns null when an interrupt arrived between two steps
   */
  private async acquireAll(config: SessionConfiguration): Promise<MirrorProcess | null> {
    if (this.interrupts.interrupted) {
      return null;
    }

    const video = await this.acquireVideoDevice(config);
    if (this.interrupts.interrupted) {
      return null;
    }

    const audio = await this.acquireAudioSink(config);
    if (this.interrupts.interrupted) {
      return null;
    }

    const sink = audio.find(resource => resource.kind === 'virtual_audio_sink');
    const mirror = await this.launchMirrorProcess(config, video.target, sink?.target);
    if (this.interrupts.interrupted) {
      return null;
    }

    return mirror;
  }

  private async waitForStop(mirror: MirrorProcess): Promise<StopEvent> {
    console.log('[LifecycleManager] Session running, waiting for interrupt or mirror exit');

    const stop = await Promise.race([
      mirror.exited.then((exit): StopEvent => ({
        reason: exit.reason === 'device-disconnected' ? 'device-disconnected' : 'mirror-exited',
        mirrorExit: exit,
      })),
      this.interrupts.wait().then((): StopEvent => ({ reason: 'interrupted' })),
    ]);

    if (stop.reason !== 'interrupted' && this.interrupts.interrupted) {
      console.log(`[LifecycleManager] Mirror ended on the interrupt (${stop.reason})`);
      return { reason: 'interrupted', mirrorExit: stop.mirrorExit };
    }

    console.log(`[LifecycleManager] Stopping: ${stop.reason}`);
    return stop;
  }

  private record(resource: AllocatedResource): void {
    this.stack.push(resource);
    console.log(`[LifecycleManager] Acquired ${resource.kind} (${resource.label})`);
  }

  private outcome(stop: StopEvent, report: TeardownReport, error?: AdbcamError): RunOutcome {
    return {
      reason: stop.reason,
      exitCode: exitCodeFor(stop, report),
      error,
      mirrorExit: stop.mirrorExit,
      released: report.released,
      releaseErrors: report.errors,
    };
  }
}

function exitCodeFor(stop: StopEvent, report: TeardownReport): ExitCode {
  if (report.errors.length > 0) {
    return ExitCode.CleanupFailed;
  }

  switch (stop.reason) {
    case 'acquisition-failed':
      return ExitCode.Failure;
    case 'interrupted':
      return ExitCode.Success;
    case 'device-disconnected':
      return ExitCode.MirrorLost;
    case 'mirror-exited':
      return stop.mirrorExit?.code === 0 ? ExitCode.Success : ExitCode.MirrorLost;
  }
}
