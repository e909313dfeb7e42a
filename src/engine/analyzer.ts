/**
 * Disconnect analysis: classifier → assessor → selector → adjuster.
 * Pure; safe to call from any number of clients at once.
 */

import type {
  ConnectionHistorySnapshot,
  ContextualFactor,
  DisconnectAnalysis,
} from '../types/analysis.js';
import { EMPTY_HISTORY } from '../types/analysis.js';
import { classifyCause } from './classifier.js';
import { assessRecoverability, assessSeverity } from './assessor.js';
import { selectStrategy } from './strategy.js';
import { adjustForHistory } from './adjuster.js';

export function analyzeDisconnect(
  reason: string,
  history: ConnectionHistorySnapshot = EMPTY_HISTORY
): DisconnectAnalysis {
  const cause = classifyCause(reason);
  const selection = selectStrategy(cause);
  const factors: ContextualFactor[] = selection.factor ? [selection.factor] : [];

  const adjusted = adjustForHistory(
    {
      strategy: selection.strategy,
      backoffMultiplier: selection.backoffMultiplier,
      maxAttempts: selection.maxAttempts,
      contextualFactors: factors,
    },
    history
  );

  return Object.freeze({
    cause,
    severity: assessSeverity(reason, history),
    recoverability: assessRecoverability(reason, history),
    strategy: adjusted.strategy,
    backoffMultiplier: adjusted.backoffMultiplier,
    maxAttempts: adjusted.maxAttempts,
    contextualFactors: Object.freeze(adjusted.contextualFactors),
  });
}
