/**
 * Disconnect cause classification
 */

import type { CauseKind } from '../types/analysis.js';

/**
 * Ordered (substring, cause) table. First match wins, so order is behavior.
 */
export const CAUSE_TABLE: ReadonlyArray<readonly [string, CauseKind]> = [
  ['ping timeout', 'NETWORK_TIMEOUT'],
  ['transport close', 'TRANSPORT_ERROR'],
  ['transport error', 'TRANSPORT_ERROR'],
  ['client namespace disconnect', 'USER_INITIATED'],
  ['io server disconnect', 'SERVER_SHUTDOWN'],
  ['connection timeout', 'NETWORK_TIMEOUT'],
  ['server error', 'SERVER_SHUTDOWN'],
  ['auth failed', 'AUTHENTICATION_FAILURE'],
  ['resource limit', 'RESOURCE_EXHAUSTION'],
];

/**
 * Map a free-text disconnect reason to a cause
 */
export function classifyCause(reason: string): CauseKind {
  const lowerReason = reason.toLowerCase();
  for (const [key, cause] of CAUSE_TABLE) {
    if (lowerReason.includes(key)) {
      return cause;
    }
  }
  return 'UNKNOWN';
}
