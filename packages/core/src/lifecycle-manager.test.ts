import { EventEmitter } from 'events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LaunchError, ProvisioningError } from './errors';
import type { AudioProvisioner, MirrorLauncher, VideoDeviceProvisioner } from './interfaces';
import { InterruptController } from './interrupt';
import { ResourceLifecycleManager } from './lifecycle-manager';
import {
  AllocatedResource,
  ExitCode,
  MirrorBindings,
  MirrorExit,
  ResourceKind,
  SessionConfiguration,
} from './types';

type FailurePoint = 'video' | 'sink' | 'loopback' | 'mirror';

interface HarnessOptions {
  failAt?: FailurePoint;
  failRelease?: ResourceKind;
  hangRelease?: ResourceKind;
  interruptDuring?: FailurePoint;
  releaseTimeoutMs?: number;
}

const config: SessionConfiguration = Object.freeze({
  serial: 'R58M123ABC',
  cameraId: '0',
  resolution: { width: 1280, height: 720 },
  fps: 30,
  audioSource: 'mic-camcorder',
});

function createHarness(options: HarnessOptions = {}) {
  const events: string[] = [];
  const launches: MirrorBindings[] = [];
  const signals = new EventEmitter();
  const interrupts = new InterruptController(signals);
  interrupts.install();

  let resolveExit: (exit: MirrorExit) => void = () => undefined;

  const releaseFor = (kind: ResourceKind) => async (): Promise<void> => {
    events.push(`release:${kind}`);
    if (options.hangRelease === kind) {
      await new Promise<void>(() => undefined);
    }
    if (options.failRelease === kind) {
      throw new Error(`${kind} release refused`);
    }
  };

  const resource = (kind: ResourceKind, handle: string, target: string): AllocatedResource => ({
    kind,
    handle,
    target,
    label: `${kind} ${handle}`,
    release: releaseFor(kind),
  });

  const step = (point: FailurePoint, error: Error): void => {
    events.push(`acquire:${point}`);
    if (options.interruptDuring === point) {
      signals.emit('SIGINT', 'SIGINT');
    }
    if (options.failAt === point) {
      throw error;
    }
  };

  const video: VideoDeviceProvisioner = {
    acquire: async () => {
      step('video', new ProvisioningError('v4l2loopback: module is busy'));
      return resource('virtual_video_device', '/dev/video0', '/dev/video0');
    },
  };

  const audio: AudioProvisioner = {
    createSink: async () => {
      step('sink', new ProvisioningError('sink AdbCam already exists'));
      return resource('virtual_audio_sink', '27', 'AdbCam');
    },
    createLoopback: async (_config, sink) => {
      step('loopback', new ProvisioningError(`cannot remap ${sink.target}.monitor`));
      return resource('virtual_audio_loopback', '28', 'AdbCam_mic');
    },
  };

  const mirror: MirrorLauncher = {
    launch: async (_config, bindings) => {
      step('mirror', new LaunchError('scrcpy exited during startup'));
      launches.push(bindings);
      return {
        pid: 4242,
        exited: new Promise<MirrorExit>((resolve) => {
          resolveExit = resolve;
        }),
        stop: releaseFor('mirror_process'),
      };
    },
  };

  const manager = new ResourceLifecycleManager({
    video,
    audio,
    mirror,
    interrupts,
    releaseTimeoutMs: options.releaseTimeoutMs,
  });

  return {
    manager,
    events,
    launches,
    interrupts,
    interrupt: () => signals.emit('SIGINT', 'SIGINT'),
    exitMirror: (exit: MirrorExit) => resolveExit(exit),
  };
}

async function untilRunning(manager: ResourceLifecycleManager, count: number): Promise<void> {
  await vi.waitFor(() => {
    expect(manager.getResources()).toHaveLength(count);
  });
}

describe('ResourceLifecycleManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('run', () => {
    it('acquires video, sink, loopback and mirror, then releases them in reverse on interrupt', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      expect(harness.manager.getResources().map(r => r.kind)).toEqual([
        'virtual_video_device',
        'virtual_audio_sink',
        'virtual_audio_loopback',
        'mirror_process',
      ]);

      harness.interrupt();
      const outcome = await running;

      expect(outcome.reason).toBe('interrupted');
      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.released).toEqual([
        'mirror_process',
        'virtual_audio_loopback',
        'virtual_audio_sink',
        'virtual_video_device',
      ]);
      expect(harness.events).toEqual([
        'acquire:video',
        'acquire:sink',
        'acquire:loopback',
        'acquire:mirror',
        'release:mirror_process',
        'release:virtual_audio_loopback',
        'release:virtual_audio_sink',
        'release:virtual_video_device',
      ]);
      expect(harness.manager.getResources()).toEqual([]);
    });

    it('binds the mirror process to the device path and sink name', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      harness.interrupt();
      await running;

      expect(harness.launches).toEqual([
        { videoDevicePath: '/dev/video0', audioSinkName: 'AdbCam' },
      ]);
    });

    it('never touches audio when no audio source is selected', async () => {
      const harness = createHarness();
      const running = harness.manager.run({ ...config, audioSource: 'none' });

      await untilRunning(harness.manager, 2);
      harness.interrupt();
      const outcome = await running;

      expect(harness.events).toEqual([
        'acquire:video',
        'acquire:mirror',
        'release:mirror_process',
        'release:virtual_video_device',
      ]);
      expect(harness.launches).toEqual([
        { videoDevicePath: '/dev/video0', audioSinkName: undefined },
      ]);
      expect(outcome.exitCode).toBe(ExitCode.Success);
    });

    it('attempts nothing else when the video device cannot be acquired', async () => {
      const harness = createHarness({ failAt: 'video' });

      const outcome = await harness.manager.run(config);

      expect(harness.events).toEqual(['acquire:video']);
      expect(outcome.reason).toBe('acquisition-failed');
      expect(outcome.exitCode).toBe(ExitCode.Failure);
      expect(outcome.error).toBeInstanceOf(ProvisioningError);
      expect(outcome.error?.message).toBe('v4l2loopback: module is busy');
      expect(outcome.released).toEqual([]);
      expect(harness.manager.getResources()).toEqual([]);
    });

    it('rolls back the sink and the video device when the loopback fails', async () => {
      const harness = createHarness({ failAt: 'loopback' });

      const outcome = await harness.manager.run(config);

      expect(harness.events).toEqual([
        'acquire:video',
        'acquire:sink',
        'acquire:loopback',
        'release:virtual_audio_sink',
        'release:virtual_video_device',
      ]);
      expect(outcome.exitCode).toBe(ExitCode.Failure);
      expect(harness.manager.getResources()).toEqual([]);
    });

    it('rolls back every audio and video resource when the mirror fails to launch', async () => {
      const harness = createHarness({ failAt: 'mirror' });

      const outcome = await harness.manager.run(config);

      expect(outcome.error).toBeInstanceOf(LaunchError);
      expect(outcome.released).toEqual([
        'virtual_audio_loopback',
        'virtual_audio_sink',
        'virtual_video_device',
      ]);
      expect(outcome.exitCode).toBe(ExitCode.Failure);
    });

    it('finishes the current step and rolls back when interrupted during setup', async () => {
      const harness = createHarness({ interruptDuring: 'video' });

      const outcome = await harness.manager.run(config);

      expect(harness.events).toEqual(['acquire:video', 'release:virtual_video_device']);
      expect(outcome.reason).toBe('interrupted');
      expect(outcome.exitCode).toBe(ExitCode.Success);
    });

    it('rolls back as an interrupt when the step in flight dies from the same signal', async () => {
      const harness = createHarness({ interruptDuring: 'mirror', failAt: 'mirror' });

      const outcome = await harness.manager.run(config);

      expect(outcome.reason).toBe('interrupted');
      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.error).toBeUndefined();
      expect(outcome.released).toEqual([
        'virtual_audio_loopback',
        'virtual_audio_sink',
        'virtual_video_device',
      ]);
    });

    it('acquires nothing when the interrupt came before the run', async () => {
      const harness = createHarness();
      harness.interrupt();

      const outcome = await harness.manager.run(config);

      expect(harness.events).toEqual([]);
      expect(outcome.reason).toBe('interrupted');
      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.released).toEqual([]);
    });

    it('reports an interrupt when the mirror dies from the same Ctrl+C', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);
      await untilRunning(harness.manager, 4);

      harness.exitMirror({ reason: 'exited', code: null, signal: 'SIGINT' });
      harness.interrupt();
      const outcome = await running;

      expect(outcome.reason).toBe('interrupted');
      expect(outcome.exitCode).toBe(ExitCode.Success);
      expect(outcome.released).toHaveLength(4);
    });

    it('tears down when the mirror process exits on its own', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      harness.exitMirror({ reason: 'exited', code: 1, signal: null });
      const outcome = await running;

      expect(outcome.reason).toBe('mirror-exited');
      expect(outcome.exitCode).toBe(ExitCode.MirrorLost);
      expect(outcome.mirrorExit).toEqual({ reason: 'exited', code: 1, signal: null });
      expect(outcome.released).toHaveLength(4);
    });

    it('reports a clean stop when the mirror process exits with code 0', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      harness.exitMirror({ reason: 'exited', code: 0, signal: null });

      expect((await running).exitCode).toBe(ExitCode.Success);
    });

    it('treats a device disconnect as a lost mirror', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      harness.exitMirror({ reason: 'device-disconnected', code: null, signal: null });
      const outcome = await running;

      expect(outcome.reason).toBe('device-disconnected');
      expect(outcome.exitCode).toBe(ExitCode.MirrorLost);
    });

    it('exits with the cleanup code when a release fails, after attempting the rest', async () => {
      const harness = createHarness({ failRelease: 'virtual_audio_sink' });
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      harness.interrupt();
      const outcome = await running;

      expect(outcome.exitCode).toBe(ExitCode.CleanupFailed);
      expect(outcome.releaseErrors).toHaveLength(1);
      expect(outcome.releaseErrors[0].kind).toBe('virtual_audio_sink');
      expect(outcome.releaseErrors[0].message).toBe(
        'Failed to release virtual_audio_sink 27: virtual_audio_sink release refused'
      );
      expect(harness.events.slice(-4)).toEqual([
        'release:mirror_process',
        'release:virtual_audio_loopback',
        'release:virtual_audio_sink',
        'release:virtual_video_device',
      ]);
    });

    it('does not let a second interrupt cut teardown short', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await untilRunning(harness.manager, 4);
      harness.interrupt();
      harness.interrupt();
      const outcome = await running;

      expect(harness.interrupts.receivedCount).toBe(2);
      expect(outcome.released).toHaveLength(4);
    });

    it('refuses to run twice at the same time', async () => {
      const harness = createHarness();
      const running = harness.manager.run(config);

      await expect(harness.manager.run(config)).rejects.toThrow('Session is already running');

      await untilRunning(harness.manager, 4);
      harness.interrupt();
      await running;
    });
  });

  describe('teardown', () => {
    it('bounds a hanging release and moves on', async () => {
      const harness = createHarness({ hangRelease: 'virtual_audio_loopback', releaseTimeoutMs: 20 });
      await harness.manager.acquireVideoDevice(config);
      await harness.manager.acquireAudioSink(config);

      const report = await harness.manager.teardown();

      expect(report.released).toEqual([
        'virtual_audio_loopback',
        'virtual_audio_sink',
        'virtual_video_device',
      ]);
      expect(report.errors.map(e => e.message)).toEqual([
        'Failed to release virtual_audio_loopback 28: release did not complete within 20ms',
      ]);
    });

    it('releases each entry once when called concurrently', async () => {
      const harness = createHarness();
      await harness.manager.acquireVideoDevice(config);
      await harness.manager.acquireAudioSink(config);

      const [first, second] = await Promise.all([
        harness.manager.teardown(),
        harness.manager.teardown(),
      ]);

      expect(first.released).toHaveLength(3);
      expect(second.released).toEqual([]);
      expect(harness.events.filter(e => e.startsWith('release:'))).toHaveLength(3);
    });

    it('records nothing for the audio step when audio is disabled', async () => {
      const harness = createHarness();

      const resources = await harness.manager.acquireAudioSink({ ...config, audioSource: 'none' });

      expect(resources).toEqual([]);
      expect(harness.manager.getResources()).toEqual([]);
    });
  });
});
