/**
 * Base Error Classes for adaptive-reconnect
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // Reconnection errors (1xx)
  RECONNECT_FAILED = 100,
  RECONNECT_MAX_ATTEMPTS = 101,
  RECONNECT_ABORTED = 102,

  // Configuration errors (3xx)
  CONFIG_INVALID = 300,

  // Input validation errors (4xx)
  VALIDATION_FAILED = 400,
  INVALID_HISTORY = 401,
  INVALID_ANALYSIS = 402,
  INVALID_BASE_DELAY = 403,

  // Monitor errors (6xx)
  MONITOR_ERROR = 600,
  MONITOR_ALREADY_ATTACHED = 601,

  // Unknown
  UNKNOWN = 999,
}

/**
 * Base error class for all adaptive-reconnect errors
 */
export class ReconnectKitError extends Error {
  /** Error code for categorization */
  readonly code: ErrorCode;
  /** Original error that caused this error */
  override readonly cause?: Error;
  /** Additional context data */
  readonly context?: Record<string, unknown>;
  /** Timestamp when error occurred */
  readonly timestamp: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'ReconnectKitError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = Date.now();

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }

  /**
   * Create error from unknown caught value
   */
  static from(err: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): ReconnectKitError {
    if (err instanceof ReconnectKitError) {
      return err;
    }

    if (err instanceof Error) {
      return new ReconnectKitError(err.message, defaultCode, { cause: err });
    }

    if (typeof err === 'string') {
      return new ReconnectKitError(err, defaultCode);
    }

    return new ReconnectKitError('Unknown error occurred', defaultCode, {
      context: { originalError: err },
    });
  }
}
