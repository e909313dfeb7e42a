/**
 * Engine configuration
 */

import { ConfigurationError } from '../errors/index.js';

/**
 * Logging sink. Anything with console's log/warn/error shape works.
 */
export interface EngineLogger {
  log(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Reconnection engine configuration
 */
export interface ReconnectionEngineConfig {
  /** Base delay for generated schedules in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Attempt records kept per client (default: 20) */
  patternLimit?: number;
  /** Client state untouched for longer than this is swept (default: 24h) */
  retentionMs?: number;
  /** Interval of the periodic sweep started by startCleanupTimer (default: 1h) */
  cleanupIntervalMs?: number;
  /** Logger (default: console) */
  logger?: EngineLogger;
}

/**
 * Hard ceiling for exponential and adaptive delays
 */
export const MAX_RETRY_DELAY_MS = 30000;

/**
 * Default engine configuration values
 */
export const DEFAULT_ENGINE_CONFIG: Required<ReconnectionEngineConfig> = {
  baseDelayMs: 1000,
  patternLimit: 20,
  retentionMs: 24 * 60 * 60 * 1000,
  cleanupIntervalMs: 60 * 60 * 1000,
  logger: console,
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Validate a (partial) engine configuration
 */
export function validateEngineConfig(config: ReconnectionEngineConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (config.baseDelayMs !== undefined && !(Number.isFinite(config.baseDelayMs) && config.baseDelayMs >= 0)) {
    errors.push(`baseDelayMs must be a non-negative number, got ${config.baseDelayMs}`);
  }
  if (config.patternLimit !== undefined && !(Number.isInteger(config.patternLimit) && config.patternLimit > 0)) {
    errors.push(`patternLimit must be a positive integer, got ${config.patternLimit}`);
  }
  if (config.retentionMs !== undefined && !(Number.isFinite(config.retentionMs) && config.retentionMs > 0)) {
    errors.push(`retentionMs must be a positive number, got ${config.retentionMs}`);
  }
  if (
    config.cleanupIntervalMs !== undefined &&
    !(Number.isFinite(config.cleanupIntervalMs) && config.cleanupIntervalMs > 0)
  ) {
    errors.push(`cleanupIntervalMs must be a positive number, got ${config.cleanupIntervalMs}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Create a complete engine config with defaults
 * @throws ConfigurationError when any value is out of range
 */
export function createEngineConfig(config: ReconnectionEngineConfig = {}): Required<ReconnectionEngineConfig> {
  const result = validateEngineConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid reconnection engine config: ${result.errors.join('; ')}`, {
      problems: result.errors,
    });
  }

  const merged: Required<ReconnectionEngineConfig> = { ...DEFAULT_ENGINE_CONFIG };
  if (config.baseDelayMs !== undefined) merged.baseDelayMs = config.baseDelayMs;
  if (config.patternLimit !== undefined) merged.patternLimit = config.patternLimit;
  if (config.retentionMs !== undefined) merged.retentionMs = config.retentionMs;
  if (config.cleanupIntervalMs !== undefined) merged.cleanupIntervalMs = config.cleanupIntervalMs;
  if (config.logger !== undefined) merged.logger = config.logger;
  return merged;
}
