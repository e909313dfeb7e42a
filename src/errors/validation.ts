/**
 * Configuration and input validation errors
 */

import { ReconnectKitError, ErrorCode } from './base.js';

/**
 * Error thrown when engine configuration is invalid
 */
export class ConfigurationError extends ReconnectKitError {
  /** Every problem found in the configuration */
  readonly problems: string[];

  constructor(
    message: string,
    options?: {
      problems?: string[];
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, ErrorCode.CONFIG_INVALID, {
      ...options,
      context: {
        ...options?.context,
        problems: options?.problems,
      },
    });
    this.name = 'ConfigurationError';
    this.problems = options?.problems ?? [];
  }
}

/**
 * Error thrown when input handed to the engine is malformed.
 * Raised at the boundary only; analysis and scheduling never throw it.
 */
export class ValidationError extends ReconnectKitError {
  /** Problems found, one per offending field */
  readonly problems: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    options?: {
      problems?: string[];
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, code, {
      ...options,
      context: {
        ...options?.context,
        problems: options?.problems,
      },
    });
    this.name = 'ValidationError';
    this.problems = options?.problems ?? [];
  }
}
