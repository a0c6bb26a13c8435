/**
 * Android device discovery using TangoADB
 * See: https://tangoadb.dev/
 */

import { AdbServerClient } from '@yume-chan/adb';
import { AdbServerNodeTcpConnector } from '@yume-chan/adb-server-node-tcp';
import { NoDevicesFoundError, ValidationError, errorMessage } from '@adbcam/core';
import { androidConfig } from './config';

/**
 * Validation pattern for serials passed on to scrcpy (USB serials and host:port)
 */
const SERIAL_PATTERN = /^[A-Za-z0-9._:-]+$/;

export function validateSerial(serial: string): void {
  if (!serial || !SERIAL_PATTERN.test(serial)) {
    throw new ValidationError(`Invalid device serial: ${serial}`, { serial });
  }
}

export interface AndroidDevice {
  serial: string;
  model: string;
  product: string;
  authorized: boolean;
}

/**
 * The part of AdbServerClient discovery relies on
 */
export interface AdbDeviceSource {
  getDevices(): Promise<ReadonlyArray<{
    serial: string;
    model?: string;
    product?: string;
    authenticating?: boolean;
    state?: string;
  }>>;
}

export const CONNECTION_HINTS = [
  'Your Android device is connected via USB',
  'USB debugging is enabled on your device',
  'You have authorized this computer on your device',
  'adb is installed and its server is running (adb start-server)',
];

export class AndroidDeviceService {
  private client: AdbDeviceSource;

  constructor(client?: AdbDeviceSource) {
    this.client = client ?? new AdbServerClient(
      new AdbServerNodeTcpConnector({
        host: androidConfig.adbHost,
        port: androidConfig.adbPort,
      })
    );
  }

  /**
   * List every device the adb server knows about
   */
  async listDevices(): Promise<AndroidDevice[]> {
    try {
      const deviceList = await this.client.getDevices();
      return deviceList.map(device => ({
        serial: device.serial,
        model: device.model || 'Unknown',
        product: device.product || 'Unknown',
        authorized: !device.authenticating && (device.state === undefined || device.state === 'device'),
      }));
    } catch (error) {
      console.error('[AndroidDeviceService] Failed to query the adb server:', errorMessage(error));
      throw new NoDevicesFoundError(
        `Cannot reach the adb server at ${androidConfig.adbHost}:${androidConfig.adbPort}: ${errorMessage(error)}`,
        { hints: CONNECTION_HINTS }
      );
    }
  }

  /**
   * Devices ready for use; fails when there are none
   */
  async listReadyDevices(): Promise<AndroidDevice[]> {
    const devices = await this.listDevices();

    for (const device of devices.filter(d => !d.authorized)) {
      console.warn(`[AndroidDeviceService] Device ${device.serial} is not authorized, skipping`);
    }

    const ready = devices.filter(d => d.authorized);
    if (ready.length === 0) {
      throw new NoDevicesFoundError('No adb devices found in "device" state', {
        hints: CONNECTION_HINTS,
      });
    }

    console.log(`[AndroidDeviceService] Found adb device(s): ${ready.map(d => d.serial).join(', ')}`);
    return ready;
  }

  async isPresent(serial: string): Promise<boolean> {
    const devices = await this.listDevices();
    return devices.some(device => device.serial === serial && device.authorized);
  }
}

// Export singleton instance
export const androidDeviceService = new AndroidDeviceService();
