/**
 * Recommendations and success prediction from a client's recent attempts.
 * Read-only: these never gate retries, they feed diagnostics.
 */

import type { StrategyKind } from '../types/analysis.js';
import type { AttemptRecord, ClientReconnectionState, ReconnectionRecommendation } from '../types/state.js';

export const DEFAULT_SUCCESS_PROBABILITY = 0.7;

const STRATEGY_SUCCESS_FACTORS: Partial<Record<StrategyKind, number>> = {
  IMMEDIATE_RETRY: 0.8,
  EXPONENTIAL_BACKOFF: 1.2,
  TRANSPORT_SWITCH: 1.1,
  ADAPTIVE_TIMING: 1.3,
};

function successRate(patterns: readonly AttemptRecord[]): number {
  if (patterns.length === 0) return 0;
  return patterns.filter((p) => p.success).length / patterns.length;
}

export function recommend(state: ClientReconnectionState | undefined): ReconnectionRecommendation[] {
  if (!state) return [];

  const recommendations: ReconnectionRecommendation[] = [];

  if (successRate(state.patterns.slice(-10)) < 0.3) {
    recommendations.push({
      type: 'connection_method',
      message: 'Consider switching connection method or checking network',
      priority: 'high',
    });
  }

  if (state.failures > state.successes * 2) {
    recommendations.push({
      type: 'backoff_strategy',
      message: 'Increase backoff delays to reduce connection pressure',
      priority: 'medium',
    });
  }

  const avgDuration = state.attempts > 0 ? state.totalDurationMs / state.attempts : 0;
  if (avgDuration > 10000) {
    recommendations.push({
      type: 'timeout_adjustment',
      message: 'Connection timeouts may be too aggressive',
      priority: 'low',
    });
  }

  return recommendations;
}

/**
 * Probability in [0, 1] that the proposed strategy reconnects this client
 */
export function predictSuccess(state: ClientReconnectionState | undefined, proposedStrategy: StrategyKind): number {
  if (!state || state.patterns.length < 3) {
    return DEFAULT_SUCCESS_PROBABILITY;
  }

  const baseRate = successRate(state.patterns.slice(-5));
  const factor = STRATEGY_SUCCESS_FACTORS[proposedStrategy] ?? 1.0;
  return Math.max(0, Math.min(1, baseRate * factor));
}
