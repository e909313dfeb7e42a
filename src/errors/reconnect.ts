/**
 * Reconnection execution and monitoring errors
 */

import { ReconnectKitError, ErrorCode } from './base.js';

/**
 * Error thrown when a reconnection schedule stops without reconnecting
 */
export class ReconnectError extends ReconnectKitError {
  /** Client the schedule belonged to */
  readonly clientId: string;
  /** Number of reconnection attempts made */
  readonly attempts: number;
  /** Maximum attempts allowed */
  readonly maxAttempts: number;
  /** Last error that caused reconnection failure */
  readonly lastError?: Error;

  constructor(
    message: string,
    clientId: string,
    attempts: number,
    maxAttempts: number,
    options?: {
      aborted?: boolean;
      lastError?: Error;
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    let code = ErrorCode.RECONNECT_FAILED;
    if (options?.aborted) {
      code = ErrorCode.RECONNECT_ABORTED;
    } else if (attempts >= maxAttempts) {
      code = ErrorCode.RECONNECT_MAX_ATTEMPTS;
    }

    super(message, code, {
      ...options,
      context: {
        ...options?.context,
        clientId,
        attempts,
        maxAttempts,
      },
    });
    this.name = 'ReconnectError';
    this.clientId = clientId;
    this.attempts = attempts;
    this.maxAttempts = maxAttempts;
    this.lastError = options?.lastError;
  }

  /**
   * Check if max attempts were reached
   */
  isMaxAttemptsReached(): boolean {
    return this.code === ErrorCode.RECONNECT_MAX_ATTEMPTS;
  }

  /**
   * Check if the schedule was abandoned by its caller
   */
  isAborted(): boolean {
    return this.code === ErrorCode.RECONNECT_ABORTED;
  }
}

/**
 * Error raised by the WebSocket disconnect monitor
 */
export class MonitorError extends ReconnectKitError {
  /** Client the error relates to */
  readonly clientId?: string;

  constructor(
    message: string,
    options?: {
      clientId?: string;
      code?: ErrorCode;
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, options?.code ?? ErrorCode.MONITOR_ERROR, {
      ...options,
      context: {
        ...options?.context,
        clientId: options?.clientId,
      },
    });
    this.name = 'MonitorError';
    this.clientId = options?.clientId;
  }
}
