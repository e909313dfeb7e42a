/**
 * History-based adjustment of selected retry parameters
 */

import type { ConnectionHistorySnapshot, ContextualFactor, StrategyKind } from '../types/analysis.js';

/** Five minutes */
export const LONG_CONNECTION_MS = 300000;

export interface AdjustableParameters {
  strategy: StrategyKind;
  backoffMultiplier: number;
  maxAttempts: number;
  contextualFactors: ContextualFactor[];
}

/**
 * Apply the history rules in order. Each rule is independent; all that hold
 * are applied. Returns a new object.
 *
 * USER_PROMPT keeps maxAttempts at 0: the engine never auto-retries a
 * disconnect it has handed to the user.
 */
export function adjustForHistory(
  params: AdjustableParameters,
  history: ConnectionHistorySnapshot
): AdjustableParameters {
  const adjusted: AdjustableParameters = {
    ...params,
    contextualFactors: [...params.contextualFactors],
  };
  const retries = adjusted.strategy !== 'USER_PROMPT';

  // Many recent failures: back off harder, give up sooner
  if (history.recentFailures > 5) {
    adjusted.backoffMultiplier *= 1.5;
    if (retries) {
      adjusted.maxAttempts = Math.max(3, adjusted.maxAttempts - 2);
    }
  }

  // Has held long connections before: retry quicker and longer
  if (history.longestConnectionMs > LONG_CONNECTION_MS) {
    adjusted.backoffMultiplier *= 0.8;
    if (retries) {
      adjusted.maxAttempts += 2;
    }
  }

  if (history.networkType === 'mobile') {
    adjusted.backoffMultiplier *= 1.3;
    if (!adjusted.contextualFactors.includes('mobile_network')) {
      adjusted.contextualFactors.push('mobile_network');
    }
  }

  return adjusted;
}
