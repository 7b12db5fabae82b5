/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors, one subclass per failure kind
 * - withErrorContext: Wraps operations with consistent error logging
 * - Result: Discriminated success/failure value for recoverable paths
 */

import type { AppLogger } from './observability/index.js';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Missing, unreadable or invalid configuration file. Always fatal.
 */
export class ConfigError extends AppError {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message, 'CONFIG_INVALID', false, problems.length ? { problems } : undefined);
    this.name = 'ConfigError';
  }
}

/**
 * No OAuth client-secret file could be found locally.
 * Recoverable: the run continues and the authentication step fails later.
 */
export class CredentialDiscoveryError extends AppError {
  constructor(message: string, public readonly searchedDir: string) {
    super(message, 'CLIENT_SECRET_NOT_FOUND', true, { searchedDir });
    this.name = 'CredentialDiscoveryError';
  }
}

/**
 * Interactive authorization or token handling failed.
 */
export class AuthenticationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_FAILED', false, context);
    this.name = 'AuthenticationError';
  }
}

/**
 * A Gmail API call failed. Carries the HTTP status when the API reported one.
 */
export class ProviderRequestError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly status?: number
  ) {
    super(message, 'PROVIDER_REQUEST_FAILED', false, { operation, status });
    this.name = 'ProviderRequestError';
  }
}

/**
 * A message body could not be decoded from its transfer encoding.
 */
export class DecodingError extends AppError {
  constructor(message: string) {
    super(message, 'BODY_DECODE_FAILED', true);
    this.name = 'DecodingError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T, E = string> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Extract a human-readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string,
  logger: AppLogger
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    logger.error('operation_failed', {
      operation: context,
      error: errorMessage(error),
      ...(error instanceof AppError ? { errorCode: error.code, ...error.context } : {}),
    });
    throw error;
  }
}
