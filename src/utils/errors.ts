/**
 * Error taxonomy
 *
 * Fatal errors reach the caller of fetchContext; everything else is
 * absorbed inside its own fan-out branch and shows up only as an
 * absent field or a flag on the context.
 */

export type CameraContextErrorCode =
  | 'LOCATION_UNAVAILABLE'
  | 'PERMISSION_DENIED'
  | 'LOCATION_TIMEOUT'
  | 'DEADLINE_EXCEEDED'
  | 'NO_RESULT'
  | 'PROVIDER_ERROR'
  | 'UNAUTHORIZED';

export interface CameraContextErrorOptions {
  cause?: unknown;
}

export class CameraContextError extends Error {
  readonly code: CameraContextErrorCode;

  constructor(code: CameraContextErrorCode, message: string, options: CameraContextErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CameraContextError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// Fatal
// =============================================================================

export class LocationUnavailableError extends CameraContextError {
  constructor(message = 'Unable to determine your location.', options: CameraContextErrorOptions = {}) {
    super('LOCATION_UNAVAILABLE', message, options);
    this.name = 'LocationUnavailableError';
  }
}

export type PermissionDeniedReason = 'denied' | 'restricted';

export class PermissionDeniedError extends CameraContextError {
  readonly reason: PermissionDeniedReason;

  constructor(reason: PermissionDeniedReason = 'denied') {
    super(
      'PERMISSION_DENIED',
      reason === 'restricted'
        ? 'Location access is restricted on this device.'
        : 'Location access was denied.'
    );
    this.name = 'PermissionDeniedError';
    this.reason = reason;
  }
}

export class LocationTimeoutError extends CameraContextError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('LOCATION_TIMEOUT', `Location request timed out after ${timeoutMs}ms`);
    this.name = 'LocationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// Degraded
// =============================================================================

export class DeadlineExceededError extends CameraContextError {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('DEADLINE_EXCEEDED', `${label} timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export class NoResultError extends CameraContextError {
  constructor(message = 'No address found for this location.') {
    super('NO_RESULT', message);
    this.name = 'NoResultError';
  }
}

export class ProviderError extends CameraContextError {
  readonly provider: string;

  constructor(provider: string, message: string, options: CameraContextErrorOptions = {}) {
    super('PROVIDER_ERROR', message, options);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class UnauthorizedError extends CameraContextError {
  readonly provider: string;

  constructor(provider: string, options: CameraContextErrorOptions = {}) {
    super('UNAUTHORIZED', `${provider} rejected the configured credentials`, options);
    this.name = 'UnauthorizedError';
    this.provider = provider;
  }
}

export type FatalContextError =
  | LocationUnavailableError
  | PermissionDeniedError
  | LocationTimeoutError;

export function isFatalContextError(error: unknown): error is FatalContextError {
  return (
    error instanceof LocationUnavailableError ||
    error instanceof PermissionDeniedError ||
    error instanceof LocationTimeoutError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
