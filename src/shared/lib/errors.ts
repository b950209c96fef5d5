/**
 * Error taxonomy shared by every layer
 *
 * Each error carries a `kind` so the poll loop can log and report it
 * without instanceof chains.
 */

export type ErrorKind = 'AuthError' | 'TransientError' | 'DeliveryError' | 'ConfigError';

/**
 * Base class for all application errors
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Credentials or bearer token rejected by the platform
 */
export class AuthError extends AppError {
  readonly kind = 'AuthError';
}

/**
 * Network failure, timeout, 5xx or rate limiting. The cycle is skipped.
 */
export class TransientError extends AppError {
  readonly kind = 'TransientError';

  /** Minimum wait requested by the server, if any */
  readonly retryAfterMs?: number;

  /** HTTP status, when the failure came from a response */
  readonly status?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number; status?: number }
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
    this.status = options?.status;
  }
}

/**
 * Webhook delivery failed
 */
export class DeliveryError extends AppError {
  readonly kind = 'DeliveryError';

  /** HTTP status returned by the webhook, if a response arrived */
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * Missing or invalid configuration; fatal at startup
 */
export class ConfigError extends AppError {
  readonly kind = 'ConfigError';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

/**
 * Type guard for application errors
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Describe any thrown value as a kind, for logs and Sentry tags
 */
export function errorKind(error: unknown): ErrorKind | 'UnexpectedError' {
  return isAppError(error) ? error.kind : 'UnexpectedError';
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
