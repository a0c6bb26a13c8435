import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AndroidDevice, CameraInfo } from '@adbcam/android';
import {
  Choice,
  Prompter,
  SessionSelector,
  defaultCamera,
  defaultFps,
  defaultResolution,
  describeCamera,
  orderResolutions,
} from './selection';

/**
 * Answers prompts by message; unanswered prompts take their default
 */
class FakePrompter implements Prompter {
  readonly asked: string[] = [];
  readonly defaults = new Map<string, unknown>();

  constructor(
    private readonly answers: Record<string, unknown> = {},
    private readonly proceed = true
  ) {}

  async select<T>(message: string, choices: Choice<T>[], defaultValue?: T): Promise<T> {
    this.asked.push(message);
    this.defaults.set(message, defaultValue);
    const wanted = message in this.answers ? this.answers[message] : defaultValue;
    const choice = choices.find(c => c.value === wanted);
    if (!choice) {
      throw new Error(`No choice for ${message}`);
    }
    return choice.value;
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    return this.proceed;
  }
}

const phone: AndroidDevice = { serial: 'R58M123ABC', model: 'SM_G991B', product: 'o1sxeea', authorized: true };
const tablet: AndroidDevice = { serial: '192.168.1.20:5555', model: 'SM_X200', product: 'gta8wifi', authorized: true };

const cameras: CameraInfo[] = [
  {
    id: '0',
    facing: 'back',
    defaultResolution: '4000x3000',
    fpsOptions: [15, 24, 30],
    resolutions: ['4000x3000', '1920x1080', '1280x720'],
  },
  {
    id: '1',
    facing: 'front',
    defaultResolution: '3264x2448',
    fpsOptions: [15, 30],
    resolutions: ['3264x2448', '640x480'],
  },
];

describe('selection defaults', () => {
  it('orders common resolutions first', () => {
    expect(orderResolutions(['3840x2160', '800x600', '1280x720', '1920x1080']))
      .toEqual(['1920x1080', '1280x720', '3840x2160', '800x600']);
  });

  it('prefers 1920x1080, else the first size', () => {
    expect(defaultResolution(['1280x720', '1920x1080'])).toBe('1920x1080');
    expect(defaultResolution(['1280x720', '640x480'])).toBe('1280x720');
  });

  it('prefers the highest frame rate', () => {
    expect(defaultFps([15, 60, 30])).toBe(60);
    expect(defaultFps([])).toBeUndefined();
  });

  it('prefers camera 0, else the first', () => {
    expect(defaultCamera(cameras)?.id).toBe('0');
    expect(defaultCamera([cameras[1]])?.id).toBe('1');
  });

  it('describes a camera with its frame rate range', () => {
    expect(describeCamera(cameras[0])).toBe('Camera 0 (back, 4000x3000, 15-30 fps)');
  });
});

describe('SessionSelector', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('auto-picks a single device and accepts the defaults', async () => {
    const prompter = new FakePrompter();
    const listCameras = vi.fn(async () => cameras);
    const selector = new SessionSelector(prompter, { listCameras });

    const config = await selector.select([phone]);

    expect(listCameras).toHaveBeenCalledWith('R58M123ABC');
    expect(prompter.asked).toEqual([
      'Select camera:',
      'Select resolution:',
      'Select frame rate:',
      'Select microphone source:',
      'Start the virtual webcam?',
    ]);
    expect(config).toEqual({
      serial: 'R58M123ABC',
      cameraId: '0',
      resolution: { width: 1920, height: 1080 },
      fps: 30,
      audioSource: 'mic-camcorder',
    });
  });

  it('asks for the device when several are connected', async () => {
    const prompter = new FakePrompter({
      'Select device:': '192.168.1.20:5555',
      'Select camera:': '1',
      'Select resolution:': '640x480',
      'Select frame rate:': 15,
      'Select microphone source:': 'none',
    });
    const listCameras = vi.fn(async () => cameras);
    const selector = new SessionSelector(prompter, { listCameras });

    const config = await selector.select([phone, tablet]);

    expect(listCameras).toHaveBeenCalledWith('192.168.1.20:5555');
    expect(prompter.defaults.get('Select resolution:')).toBe('640x480');
    expect(config).toEqual({
      serial: '192.168.1.20:5555',
      cameraId: '1',
      resolution: { width: 640, height: 480 },
      fps: 15,
      audioSource: 'none',
    });
  });

  it('returns null when the user declines to start', async () => {
    const selector = new SessionSelector(new FakePrompter({}, false), { listCameras: async () => cameras });

    await expect(selector.select([phone])).resolves.toBeNull();
  });
});
