import type { ResourceKind } from './types';

/**
 * Error codes for every failure the tool surfaces
 */
export enum AdbcamErrorCode {
  NO_DEVICES_FOUND = 'NO_DEVICES_FOUND',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  PROVISIONING_FAILED = 'PROVISIONING_FAILED',
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  RELEASE_FAILED = 'RELEASE_FAILED',
}

/**
 * Base error with structured details
 */
export class AdbcamError extends Error {
  public readonly code: AdbcamErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AdbcamErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AdbcamError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON-serializable object
   */
  toJSON(): {
    code: AdbcamErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export class NoDevicesFoundError extends AdbcamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(AdbcamErrorCode.NO_DEVICES_FOUND, message, details);
    this.name = 'NoDevicesFoundError';
  }
}

export class ValidationError extends AdbcamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(AdbcamErrorCode.VALIDATION_FAILED, message, details);
    this.name = 'ValidationError';
  }
}

export class ProvisioningError extends AdbcamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(AdbcamErrorCode.PROVISIONING_FAILED, message, details);
    this.name = 'ProvisioningError';
  }
}

export class LaunchError extends AdbcamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(AdbcamErrorCode.LAUNCH_FAILED, message, details);
    this.name = 'LaunchError';
  }
}

export class ReleaseError extends AdbcamError {
  public readonly kind: ResourceKind;

  constructor(kind: ResourceKind, message: string, details?: Record<string, unknown>) {
    super(AdbcamErrorCode.RELEASE_FAILED, message, { kind, ...details });
    this.name = 'ReleaseError';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown during acquisition so the caller always sees an AdbcamError
 */
export function toAdbcamError(error: unknown): AdbcamError {
  if (error instanceof AdbcamError) {
    return error;
  }
  return new ProvisioningError(`Unexpected failure: ${errorMessage(error)}`);
}
