/**
 * Strategy selection
 */

import type { CauseKind, ContextualFactor, StrategyKind } from '../types/analysis.js';

/**
 * Baseline retry parameters for a cause
 */
export interface StrategySelection {
  strategy: StrategyKind;
  backoffMultiplier: number;
  maxAttempts: number;
  factor: ContextualFactor | null;
}

const STRATEGY_TABLE: Record<CauseKind, StrategySelection> = {
  NETWORK_TIMEOUT: {
    strategy: 'EXPONENTIAL_BACKOFF',
    backoffMultiplier: 1.5,
    maxAttempts: 8,
    factor: 'network_instability',
  },
  SERVER_SHUTDOWN: {
    strategy: 'LINEAR_BACKOFF',
    backoffMultiplier: 2.0,
    maxAttempts: 5,
    factor: 'server_maintenance',
  },
  // Quick retries, alternating transports
  TRANSPORT_ERROR: {
    strategy: 'TRANSPORT_SWITCH',
    backoffMultiplier: 0.5,
    maxAttempts: 6,
    factor: 'transport_instability',
  },
  AUTHENTICATION_FAILURE: {
    strategy: 'USER_PROMPT',
    backoffMultiplier: 0,
    maxAttempts: 0,
    factor: 'auth_issue',
  },
  RESOURCE_EXHAUSTION: {
    strategy: 'ADAPTIVE_TIMING',
    backoffMultiplier: 3.0,
    maxAttempts: 4,
    factor: 'resource_pressure',
  },
  USER_INITIATED: {
    strategy: 'USER_PROMPT',
    backoffMultiplier: 0,
    maxAttempts: 0,
    factor: 'manual_disconnect',
  },
  UNKNOWN: {
    strategy: 'ADAPTIVE_TIMING',
    backoffMultiplier: 1.2,
    maxAttempts: 6,
    factor: null,
  },
};

/**
 * Pick the retry strategy and baseline parameters for a cause
 */
export function selectStrategy(cause: CauseKind): StrategySelection {
  return { ...STRATEGY_TABLE[cause] };
}
