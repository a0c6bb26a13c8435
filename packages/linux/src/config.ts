/**
 * Linux host configuration
 * Environment variable overrides with defaults
 */

import { parseBoolEnv, parseStringEnv } from '@adbcam/core';

export const linuxConfig = {
  /**
   * Device node the v4l2loopback instance is created at
   */
  videoDevice: parseStringEnv('ADBCAM_VIDEO_DEVICE', '/dev/video0'),

  /**
   * Name video applications show for the virtual camera
   */
  cardLabel: parseStringEnv('ADBCAM_CARD_LABEL', 'AdbCam'),

  /**
   * Name of the virtual audio sink; the microphone is exposed as <name>_mic
   */
  sinkName: parseStringEnv('ADBCAM_SINK_NAME', 'AdbCam'),

  /**
   * Run modprobe through sudo
   */
  useSudo: parseBoolEnv('ADBCAM_USE_SUDO', true),

  /**
   * Audio server control utility
   */
  pactlBin: parseStringEnv('PACTL_BIN', 'pactl'),
} as const;

export type LinuxConfig = typeof linuxConfig;
