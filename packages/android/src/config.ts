/**
 * Android / scrcpy configuration
 * Environment variable overrides with defaults
 */

import { parseIntEnv, parseStringEnv } from '@adbcam/core';

export const androidConfig = {
  /**
   * adb server address used by TangoADB
   */
  adbHost: parseStringEnv('ADB_SERVER_HOST', '127.0.0.1'),
  adbPort: parseIntEnv('ADB_SERVER_PORT', 5037),

  /**
   * scrcpy executable
   */
  scrcpyBin: parseStringEnv('SCRCPY_BIN', 'scrcpy'),

  /**
   * Local port scrcpy tunnels through
   */
  scrcpyPort: parseIntEnv('SCRCPY_PORT', 27183),

  /**
   * Timeout for `scrcpy --list-camera-sizes` in milliseconds
   */
  listTimeout: parseIntEnv('SCRCPY_LIST_TIMEOUT', 30000),

  /**
   * How long scrcpy must stay up before the launch counts as successful
   */
  startupGrace: parseIntEnv('SCRCPY_STARTUP_GRACE', 1500),

  /**
   * Wait after SIGTERM before SIGKILL, in milliseconds
   */
  stopTimeout: parseIntEnv('SCRCPY_STOP_TIMEOUT', 2000),
} as const;

export type AndroidConfig = typeof androidConfig;
