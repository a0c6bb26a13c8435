/**
 * Shared configuration
 * Environment variable overrides with defaults
 */

/**
 * Parse environment variable as integer with fallback
 */
export function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value) {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }
  return defaultValue;
}

/**
 * Parse environment variable as string with fallback
 */
export function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Parse environment variable as boolean; anything but "false"/"0" is true
 */
export function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value !== 'false' && value !== '0';
}

export const coreConfig = {
  /**
   * Upper bound for a single release action in milliseconds
   */
  releaseTimeout: parseIntEnv('ADBCAM_RELEASE_TIMEOUT', 10000),

  /**
   * Upper bound for one-shot system commands in milliseconds
   */
  commandTimeout: parseIntEnv('ADBCAM_COMMAND_TIMEOUT', 10000),
} as const;

export type CoreConfig = typeof coreConfig;
