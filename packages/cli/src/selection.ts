/**
 * Interactive selection of device, camera, resolution, frame rate and microphone
 */

import { confirm, select } from '@inquirer/prompts';
import type { SessionConfiguration } from '@adbcam/core';
import { DEFAULT_MIC_SOURCE, MIC_SOURCES } from '@adbcam/android';
import type { AndroidDevice, CameraInfo } from '@adbcam/android';
import { printSummary } from './output';
import { buildSessionConfiguration, offeredFps, offeredResolutions } from './session';

export interface Choice<T> {
  name: string;
  value: T;
  description?: string;
}

export interface Prompter {
  select<T>(message: string, choices: Choice<T>[], defaultValue?: T): Promise<T>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

/**
 * Terminal prompts; Ctrl+C rejects with an ExitPromptError
 */
export class InquirerPrompter implements Prompter {
  select<T>(message: string, choices: Choice<T>[], defaultValue?: T): Promise<T> {
    return select({ message, choices, default: defaultValue });
  }

  confirm(message: string, defaultValue: boolean): Promise<boolean> {
    return confirm({ message, default: defaultValue });
  }
}

export interface CameraLister {
  listCameras(serial: string): Promise<CameraInfo[]>;
}

const COMMON_RESOLUTIONS = ['1920x1080', '1280x720', '640x480', '1920x1440', '2560x1440', '3840x2160'];
const PREFERRED_RESOLUTION = '1920x1080';
const PREFERRED_CAMERA = '0';

/**
 * Common sizes first, in their usual order, then everything else as listed
 */
export function orderResolutions(resolutions: string[]): string[] {
  const common = COMMON_RESOLUTIONS.filter(resolution => resolutions.includes(resolution));
  const rest = resolutions.filter(resolution => !COMMON_RESOLUTIONS.includes(resolution));
  return [...common, ...rest];
}

export function defaultResolution(resolutions: string[]): string | undefined {
  return resolutions.includes(PREFERRED_RESOLUTION) ? PREFERRED_RESOLUTION : resolutions[0];
}

export function defaultFps(fpsOptions: number[]): number | undefined {
  return fpsOptions.length > 0 ? Math.max(...fpsOptions) : undefined;
}

export function defaultCamera(cameras: CameraInfo[]): CameraInfo | undefined {
  return cameras.find(camera => camera.id === PREFERRED_CAMERA) ?? cameras[0];
}

export function describeCamera(camera: CameraInfo): string {
  const fps = offeredFps(camera);
  const range = fps.length > 1 ? `${Math.min(...fps)}-${Math.max(...fps)}` : `${fps[0]}`;
  return `Camera ${camera.id} (${camera.facing}, ${camera.defaultResolution}, ${range} fps)`;
}

function describeDevice(device: AndroidDevice): string {
  return `${device.serial} (${device.model})`;
}

export class SessionSelector {
  constructor(
    private readonly prompter: Prompter,
    private readonly cameras: CameraLister
  ) {}

  /**
   * Walk the user through every choice
   * Resolves null when the user declines to start
   */
  async select(devices: AndroidDevice[]): Promise<SessionConfiguration | null> {
    const device = await this.selectDevice(devices);
    const cameras = await this.cameras.listCameras(device.serial);

    const cameraId = await this.prompter.select(
      'Select camera:',
      cameras.map(camera => ({ name: describeCamera(camera), value: camera.id })),
      defaultCamera(cameras)?.id
    );
    const camera = cameras.find(c => c.id === cameraId) ?? cameras[0];

    const resolutions = orderResolutions(offeredResolutions(camera));
    const resolution = await this.prompter.select(
      'Select resolution:',
      resolutions.map(value => ({ name: value, value })),
      defaultResolution(resolutions)
    );

    const fpsOptions = offeredFps(camera);
    const fps = await this.prompter.select(
      'Select frame rate:',
      fpsOptions.map(value => ({ name: `${value} fps`, value })),
      defaultFps(fpsOptions)
    );

    const audioSource = await this.prompter.select<string>(
      'Select microphone source:',
      [
        ...MIC_SOURCES.map(source => ({ name: source.id, value: source.id, description: source.description })),
        { name: 'none', value: 'none', description: 'Video only, no virtual microphone' },
      ],
      DEFAULT_MIC_SOURCE
    );

    const config = buildSessionConfiguration(
      { serial: device.serial, cameraId, resolution, fps, audioSource },
      { devices, cameras }
    );

    printSummary(config, device, camera);
    const proceed = await this.prompter.confirm('Start the virtual webcam?', true);
    return proceed ? config : null;
  }

  async selectDevice(devices: AndroidDevice[]): Promise<AndroidDevice> {
    if (devices.length === 1) {
      console.log(`Using device ${describeDevice(devices[0])}`);
      return devices[0];
    }

    const serial = await this.prompter.select(
      'Select device:',
      devices.map(device => ({ name: describeDevice(device), value: device.serial }))
    );
    return devices.find(device => device.serial === serial) ?? devices[0];
  }
}
