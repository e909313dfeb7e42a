/**
 * Severity and recoverability assessment.
 *
 * Both functions look at the raw reason text; only the classifier lower-cases.
 */

import type {
  ConnectionHistorySnapshot,
  RecoverabilityLevel,
  SeverityLevel,
} from '../types/analysis.js';

export function assessSeverity(reason: string, history: ConnectionHistorySnapshot): SeverityLevel {
  let severity: SeverityLevel = 'MEDIUM';

  if (reason.includes('timeout') || reason.includes('error')) {
    severity = 'HIGH';
  }
  // Applied after the HIGH rule: "client error" ends up LOW
  if (reason.includes('client') || reason.includes('user')) {
    severity = 'LOW';
  }

  if (history.recentFailures > 3) {
    severity = 'HIGH';
  }

  return severity;
}

export function assessRecoverability(
  reason: string,
  history: ConnectionHistorySnapshot
): RecoverabilityLevel {
  if (reason.includes('auth') || reason.includes('user')) {
    return 'LOW';
  }
  if (reason.includes('server') && history.serverRestarts > 0) {
    return 'MEDIUM';
  }
  if (reason.includes('timeout') || reason.includes('transport')) {
    return 'HIGH';
  }
  return 'MEDIUM';
}
