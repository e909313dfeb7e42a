/**
 * Per-client and process-wide reconnection state types
 */

import type { PercentileStats } from './metrics.js';

/**
 * Outcome of a single tracked reconnection attempt
 */
export interface AttemptRecord {
  attempt: number;
  success: boolean;
  durationMs: number;
  /** Epoch milliseconds */
  timestamp: number;
}

/**
 * Rolling reconnection record for one client.
 * Invariant: attempts === successes + failures.
 */
export interface ClientReconnectionState {
  attempts: number;
  successes: number;
  failures: number;
  totalDurationMs: number;
  lastAttempt: AttemptRecord | null;
  /** Most recent attempts, oldest first, bounded by the pattern limit */
  patterns: AttemptRecord[];
}

/**
 * Cross-client counters
 */
export interface GlobalReconnectionStats {
  totalAttempts: number;
  successfulReconnections: number;
  failedReconnections: number;
  /** Smoothed as (previous + sample) / 2 on every attempt */
  averageReconnectionTimeMs: number;
}

/**
 * Global stats as reported to telemetry
 */
export interface GlobalStatsSnapshot extends GlobalReconnectionStats {
  /** successfulReconnections / totalAttempts (0 before any attempt) */
  successRate: number;
  /** Clients with live state in the store */
  activeClients: number;
  /** Distribution of tracked attempt durations */
  durationPercentiles: PercentileStats;
  lastUpdated: number;
}

export type RecommendationType = 'connection_method' | 'backoff_strategy' | 'timeout_adjustment';

export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface ReconnectionRecommendation {
  type: RecommendationType;
  message: string;
  priority: RecommendationPriority;
}

/**
 * Create empty client state
 */
export function emptyClientState(): ClientReconnectionState {
  return {
    attempts: 0,
    successes: 0,
    failures: 0,
    totalDurationMs: 0,
    lastAttempt: null,
    patterns: [],
  };
}

/**
 * Copy client state so callers cannot reach the stored record
 */
export function cloneClientState(state: ClientReconnectionState): ClientReconnectionState {
  return {
    ...state,
    lastAttempt: state.lastAttempt ? { ...state.lastAttempt } : null,
    patterns: state.patterns.map((p) => ({ ...p })),
  };
}
