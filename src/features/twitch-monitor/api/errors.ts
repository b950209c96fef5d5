/**
 * Map failures of Twitch requests onto the application error taxonomy
 */

import { AppError, AuthError, HttpError, TransientError, errorMessage } from '../../../shared';

/**
 * Translate an error from a Helix API request
 *
 * 401/403 mean the bearer token was rejected. Everything else, including
 * network errors, timeouts and 429, skips the current cycle.
 */
export function toApiError(error: unknown, context: string): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof HttpError) {
    if (error.isAuthError()) {
      return new AuthError(`${context}: token rejected (HTTP ${error.status})`, { cause: error });
    }
    if (error.isRateLimited()) {
      return new TransientError(`${context}: rate limited`, {
        cause: error,
        status: error.status,
        retryAfterMs: error.retryAfterMs,
      });
    }
    return new TransientError(`${context}: HTTP ${error.status} ${error.statusText}`, {
      cause: error,
      status: error.status,
    });
  }

  return new TransientError(`${context}: ${errorMessage(error)}`, { cause: error });
}

/**
 * Translate an error from the token endpoint
 *
 * Twitch answers 400 or 403 for an unknown client id or a wrong secret.
 */
export function toTokenError(error: unknown): AppError {
  if (error instanceof HttpError && error.isClientError() && !error.isRateLimited()) {
    return new AuthError(`Credentials rejected by auth endpoint (HTTP ${error.status})`, {
      cause: error,
    });
  }
  return toApiError(error, 'Token request failed');
}
