/**
 * Session configuration validation
 * Checks the user's choices against what discovery offered, then freezes them
 */

import { z } from 'zod';
import {
  AudioSourceChoice,
  SessionConfiguration,
  ValidationError,
  parseResolution,
} from '@adbcam/core';
import { isAudioSourceChoice } from '@adbcam/android';
import type { AndroidDevice, CameraInfo } from '@adbcam/android';

const DEFAULT_FPS = 30;

const SessionSelectionSchema = z.object({
  serial: z.string().regex(/^[A-Za-z0-9._:-]+$/, 'must be an adb serial'),
  cameraId: z.string().regex(/^\d+$/, 'must be a camera number'),
  resolution: z.string().regex(/^\d+x\d+$/, 'must look like WIDTHxHEIGHT'),
  fps: z.number().int().positive(),
  audioSource: z.custom<AudioSourceChoice>(
    value => typeof value === 'string' && isAudioSourceChoice(value),
    'must be a microphone source or none'
  ),
});

export type SessionSelection = z.infer<typeof SessionSelectionSchema>;

/**
 * What discovery found, used to check a selection is still on offer
 */
export interface DiscoveredOptions {
  devices: AndroidDevice[];
  cameras: CameraInfo[];
}

/**
 * Resolutions a camera offers; falls back to its default size
 */
export function offeredResolutions(camera: CameraInfo): string[] {
  return camera.resolutions.length > 0 ? camera.resolutions : [camera.defaultResolution];
}

export function offeredFps(camera: CameraInfo): number[] {
  return camera.fpsOptions.length > 0 ? camera.fpsOptions : [DEFAULT_FPS];
}

export function buildSessionConfiguration(
  selection: unknown,
  offered: DiscoveredOptions
): SessionConfiguration {
  const parsed = SessionSelectionSchema.safeParse(selection);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid session configuration: ${issues.join('; ')}`, { issues });
  }
  const { serial, cameraId, resolution, fps, audioSource } = parsed.data;

  if (!offered.devices.some(device => device.serial === serial)) {
    throw new ValidationError(`Device ${serial} is not connected`, { serial });
  }

  const camera = offered.cameras.find(c => c.id === cameraId);
  if (!camera) {
    throw new ValidationError(`Camera ${cameraId} is not available on ${serial}`, { cameraId });
  }

  if (!offeredResolutions(camera).includes(resolution)) {
    throw new ValidationError(`Camera ${cameraId} does not offer ${resolution}`, { resolution });
  }

  if (!offeredFps(camera).includes(fps)) {
    throw new ValidationError(`Camera ${cameraId} does not offer ${fps} fps`, { fps });
  }

  const size = parseResolution(resolution);
  if (!size) {
    throw new ValidationError(`Invalid resolution: ${resolution}`, { resolution });
  }

  return Object.freeze({
    serial,
    cameraId,
    resolution: Object.freeze(size),
    fps,
    audioSource,
  });
}

/**
 * The part of AndroidDeviceService the presence check needs
 */
export interface DevicePresence {
  isPresent(serial: string): Promise<boolean>;
}

/**
 * Re-check against a fresh adb listing that the chosen device is still there
 */
export async function ensureDevicePresent(devices: DevicePresence, serial: string): Promise<void> {
  if (!(await devices.isPresent(serial))) {
    throw new ValidationError(`Device ${serial} is no longer connected`, { serial });
  }
}
