/**
 * Camera discovery through `scrcpy --list-camera-sizes`
 */

import {
  CommandFailedError,
  CommandRunner,
  NoDevicesFoundError,
  errorMessage,
} from '@adbcam/core';
import { androidConfig } from './config';
import { CONNECTION_HINTS, validateSerial } from './device-service';

export interface CameraInfo {
  id: string;
  /** back, front or external */
  facing: string;
  defaultResolution: string;
  fpsOptions: number[];
  resolutions: string[];
}

const CAMERA_LINE = /--camera-id=(\d+)\s+\(([^,]+),\s*(\d+x\d+),\s*fps=\[([^\]]+)\]\)/;
const SIZE_LINE = /^-\s*(\d+x\d+)$/;
const NO_DEVICE_MARKER = 'Could not find any ADB device';

/**
 * Parse the camera listing:
 *
 *     --camera-id=0    (back, 4000x3000, fps=[15, 24, 30])
 *         - 4000x3000
 *         - 1920x1080
 */
export function parseCameraSizes(output: string): CameraInfo[] {
  const cameras: CameraInfo[] = [];
  let current: CameraInfo | undefined;

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();

    const cameraMatch = line.match(CAMERA_LINE);
    if (cameraMatch) {
      current = {
        id: cameraMatch[1],
        facing: cameraMatch[2].trim(),
        defaultResolution: cameraMatch[3],
        fpsOptions: cameraMatch[4]
          .split(',')
          .map(value => parseInt(value.trim(), 10))
          .filter(value => !isNaN(value)),
        resolutions: [],
      };
      cameras.push(current);
      continue;
    }

    const sizeMatch = line.match(SIZE_LINE);
    if (current && sizeMatch) {
      current.resolutions.push(sizeMatch[1]);
    }
  }

  return cameras;
}

export class CameraService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly scrcpyBin: string = androidConfig.scrcpyBin,
    private readonly timeoutMs: number = androidConfig.listTimeout
  ) {}

  async listCameras(serial: string): Promise<CameraInfo[]> {
    validateSerial(serial);
    console.log(`[CameraService] Getting camera information from ${serial}...`);

    let output: string;
    try {
      const { stdout, stderr } = await this.runner.run(
        this.scrcpyBin,
        [`--serial=${serial}`, '--list-camera-sizes'],
        { timeoutMs: this.timeoutMs }
      );
      output = `${stdout}\n${stderr}`;
    } catch (error) {
      const stderr = error instanceof CommandFailedError ? error.stderr : '';
      if (stderr.includes(NO_DEVICE_MARKER)) {
        throw new NoDevicesFoundError(`No adb device found for ${serial}`, { hints: CONNECTION_HINTS });
      }
      console.error(`[CameraService] Failed to get camera information:`, errorMessage(error));
      throw new NoDevicesFoundError(
        `Could not get camera information from ${serial}: ${errorMessage(error)}`,
        {
          hints: [
            'The device supports camera capture through scrcpy (Android 12 or newer)',
            'Camera permissions are granted',
            `${this.scrcpyBin} is installed and on PATH`,
          ],
        }
      );
    }

    if (output.includes(NO_DEVICE_MARKER)) {
      throw new NoDevicesFoundError(`No adb device found for ${serial}`, { hints: CONNECTION_HINTS });
    }

    const cameras = parseCameraSizes(output);
    if (cameras.length === 0) {
      throw new NoDevicesFoundError(`No cameras found on device ${serial}`);
    }

    return cameras;
  }
}
