/**
 * Boundary validation for input arriving from the transport layer
 */

import type { ConnectionHistorySnapshot, DisconnectAnalysis } from '../types/analysis.js';
import { EMPTY_HISTORY, STRATEGY_KINDS } from '../types/analysis.js';
import { ErrorCode, ValidationError } from '../errors/index.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkCount(errors: string[], field: string, value: unknown): void {
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    errors.push(`${field} must be a non-negative number`);
  }
}

/**
 * Validate a history snapshot received from outside the process.
 * Missing fields are allowed and default to an empty history.
 */
export function validateHistorySnapshot(input: unknown): ValidationResult {
  const errors: string[] = [];

  if (input === undefined || input === null) {
    return { valid: true, errors };
  }
  if (!isRecord(input)) {
    return { valid: false, errors: ['history must be an object'] };
  }

  checkCount(errors, 'recentFailures', input.recentFailures);
  checkCount(errors, 'longestConnectionMs', input.longestConnectionMs);
  checkCount(errors, 'serverRestarts', input.serverRestarts);
  if (input.networkType !== undefined && typeof input.networkType !== 'string') {
    errors.push('networkType must be a string');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Turn untrusted input into a snapshot, filling absent fields
 * @throws ValidationError when a field is present but malformed
 */
export function parseHistorySnapshot(input: unknown): ConnectionHistorySnapshot {
  const result = validateHistorySnapshot(input);
  if (!result.valid) {
    throw new ValidationError(`Invalid connection history: ${result.errors.join('; ')}`, ErrorCode.INVALID_HISTORY, {
      problems: result.errors,
    });
  }
  if (!isRecord(input)) {
    return EMPTY_HISTORY;
  }

  return Object.freeze({
    recentFailures: typeof input.recentFailures === 'number' ? input.recentFailures : EMPTY_HISTORY.recentFailures,
    longestConnectionMs:
      typeof input.longestConnectionMs === 'number' ? input.longestConnectionMs : EMPTY_HISTORY.longestConnectionMs,
    serverRestarts: typeof input.serverRestarts === 'number' ? input.serverRestarts : EMPTY_HISTORY.serverRestarts,
    networkType: typeof input.networkType === 'string' ? input.networkType : EMPTY_HISTORY.networkType,
  });
}

/**
 * Check an analysis before it is expanded into a schedule
 */
export function validateAnalysis(analysis: DisconnectAnalysis): ValidationResult {
  const errors: string[] = [];

  if (!STRATEGY_KINDS.includes(analysis.strategy)) {
    errors.push(`Unknown strategy: ${String(analysis.strategy)}`);
  }
  if (!Number.isInteger(analysis.maxAttempts) || analysis.maxAttempts < 0) {
    errors.push(`maxAttempts must be a non-negative integer, got ${analysis.maxAttempts}`);
  }
  if (!Number.isFinite(analysis.backoffMultiplier) || analysis.backoffMultiplier < 0) {
    errors.push(`backoffMultiplier must be a non-negative number, got ${analysis.backoffMultiplier}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * @throws ValidationError when the analysis or base delay is malformed
 */
export function assertSchedulable(analysis: DisconnectAnalysis, baseDelayMs: number): void {
  if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
    throw new ValidationError(`baseDelayMs must be a non-negative number, got ${baseDelayMs}`, ErrorCode.INVALID_BASE_DELAY);
  }
  const result = validateAnalysis(analysis);
  if (!result.valid) {
    throw new ValidationError(`Invalid analysis: ${result.errors.join('; ')}`, ErrorCode.INVALID_ANALYSIS, {
      problems: result.errors,
    });
  }
}
