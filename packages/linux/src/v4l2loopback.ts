/**
 * v4l2loopback kernel module provisioning
 * Creates the virtual camera node scrcpy writes frames into
 */

import { existsSync } from 'fs';
import {
  AllocatedResource,
  BaseProvisioner,
  CommandRunner,
  NO_TIMEOUT,
  ProvisioningError,
  SessionConfiguration,
  ValidationError,
  VideoDeviceProvisioner,
} from '@adbcam/core';
import { linuxConfig } from './config';

const MODULE_NAME = 'v4l2loopback';
const DEVICE_PATH_PATTERN = /^\/dev\/video(\d+)$/;
const CARD_LABEL_PATTERN = /^[A-Za-z0-9_.-]+$/;

export interface V4l2LoopbackOptions {
  devicePath: string;
  cardLabel: string;
  useSudo: boolean;
  /** Checks for the device node after modprobe returns */
  pollAttempts: number;
  pollIntervalMs: number;
  exists: (path: string) => boolean;
}

const defaultOptions: V4l2LoopbackOptions = {
  devicePath: linuxConfig.videoDevice,
  cardLabel: linuxConfig.cardLabel,
  useSudo: linuxConfig.useSudo,
  pollAttempts: 20,
  pollIntervalMs: 100,
  exists: existsSync,
};

/**
 * Extract N from /dev/videoN
 */
export function parseVideoNumber(devicePath: string): number {
  const match = devicePath.match(DEVICE_PATH_PATTERN);
  if (!match) {
    throw new ValidationError(`Invalid video device path: ${devicePath}`, { devicePath });
  }
  return parseInt(match[1], 10);
}

export class V4l2LoopbackProvisioner extends BaseProvisioner implements VideoDeviceProvisioner {
  private readonly options: V4l2LoopbackOptions;
  private readonly videoNr: number;

  constructor(runner: CommandRunner, options: Partial<V4l2LoopbackOptions> = {}) {
    super('V4l2Loopback', runner);
    this.options = { ...defaultOptions, ...options };
    this.videoNr = parseVideoNumber(this.options.devicePath);
    if (!CARD_LABEL_PATTERN.test(this.options.cardLabel)) {
      throw new ValidationError(`Invalid card label: ${this.options.cardLabel}`);
    }
  }

  /**
   * Check lsmod for the module; an lsmod failure counts as not loaded
   */
  async isModuleLoaded(): Promise<boolean> {
    try {
      const { stdout } = await this.runner.run('lsmod', [], { timeoutMs: NO_TIMEOUT });
      return new RegExp(`^${MODULE_NAME}\\s`, 'm').test(stdout);
    } catch (error) {
      console.warn(`[${this.name}] lsmod failed, assuming ${MODULE_NAME} is not loaded:`, error);
      return false;
    }
  }

  async acquire(config: SessionConfiguration): Promise<AllocatedResource> {
    const { devicePath } = this.options;

    if (await this.isModuleLoaded()) {
      return this.reuseLoadedDevice(devicePath);
    }

    const { width, height } = config.resolution;
    console.log(`[${this.name}] Loading ${MODULE_NAME} at ${devicePath} (${width}x${height})`);

    await this.runOrFail(
      ...this.privileged('modprobe', [
        MODULE_NAME,
        'devices=1',
        `video_nr=${this.videoNr}`,
        `card_label=${this.options.cardLabel}`,
        'exclusive_caps=1',
        `max_width=${width}`,
        `max_height=${height}`,
      ]),
      `Failed to load ${MODULE_NAME}`
    );

    await this.waitForDevice(devicePath);

    return {
      kind: 'virtual_video_device',
      handle: devicePath,
      target: devicePath,
      label: `${devicePath} (${this.options.cardLabel})`,
      release: () => this.unload(),
    };
  }

  /**
   * Unload the module; fails while any process still holds the device
   */
  async unload(): Promise<void> {
    await this.runRelease(...this.privileged('modprobe', ['-r', MODULE_NAME]));
  }

  private reuseLoadedDevice(devicePath: string): AllocatedResource {
    if (!this.options.exists(devicePath)) {
      throw new ProvisioningError(
        `${MODULE_NAME} is already loaded but ${devicePath} does not exist. ` +
        `Unload it with "sudo modprobe -r ${MODULE_NAME}" and try again.`,
        { devicePath }
      );
    }

    console.log(`[${this.name}] ${MODULE_NAME} already loaded, using ${devicePath}`);

    return {
      kind: 'virtual_video_device',
      handle: devicePath,
      target: devicePath,
      label: `${devicePath} (already loaded)`,
      // Not loaded by this session, so it stays loaded
      release: async () => {
        console.log(`[${this.name}] Leaving ${MODULE_NAME} loaded`);
      },
    };
  }

  private async waitForDevice(devicePath: string): Promise<void> {
    for (let attempt = 0; attempt < this.options.pollAttempts; attempt++) {
      if (this.options.exists(devicePath)) {
        return;
      }
      await new Promise(resolve => setTimeout(resolve, this.options.pollIntervalMs));
    }

    // The module is loaded at this point; unload it so nothing is left behind
    try {
      await this.unload();
    } catch (error) {
      console.error(`[${this.name}] Failed to unload ${MODULE_NAME} after missing device:`, error);
    }

    throw new ProvisioningError(
      `${MODULE_NAME} loaded but ${devicePath} did not appear`,
      { devicePath }
    );
  }

  private privileged(command: string, args: string[]): [string, string[]] {
    return this.options.useSudo ? ['sudo', [command, ...args]] : [command, args];
  }
}
