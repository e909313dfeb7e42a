/**
 * Disconnect analysis types
 */

/**
 * Categorical cause of a disconnection
 */
export type CauseKind =
  | 'NETWORK_TIMEOUT'
  | 'TRANSPORT_ERROR'
  | 'USER_INITIATED'
  | 'SERVER_SHUTDOWN'
  | 'AUTHENTICATION_FAILURE'
  | 'RESOURCE_EXHAUSTION'
  | 'UNKNOWN';

export const CAUSE_KINDS: readonly CauseKind[] = [
  'NETWORK_TIMEOUT',
  'TRANSPORT_ERROR',
  'USER_INITIATED',
  'SERVER_SHUTDOWN',
  'AUTHENTICATION_FAILURE',
  'RESOURCE_EXHAUSTION',
  'UNKNOWN',
];

export type SeverityLevel = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Qualitative estimate of whether a reconnection can succeed at all
 */
export type RecoverabilityLevel = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Named retry policy controlling the delay shape of a schedule.
 * USER_PROMPT means the engine declines to retry on its own.
 */
export type StrategyKind =
  | 'IMMEDIATE_RETRY'
  | 'EXPONENTIAL_BACKOFF'
  | 'LINEAR_BACKOFF'
  | 'ADAPTIVE_TIMING'
  | 'TRANSPORT_SWITCH'
  | 'USER_PROMPT';

export const STRATEGY_KINDS: readonly StrategyKind[] = [
  'IMMEDIATE_RETRY',
  'EXPONENTIAL_BACKOFF',
  'LINEAR_BACKOFF',
  'ADAPTIVE_TIMING',
  'TRANSPORT_SWITCH',
  'USER_PROMPT',
];

/**
 * Conditions noted while analyzing a disconnect
 */
export type ContextualFactor =
  | 'network_instability'
  | 'server_maintenance'
  | 'transport_instability'
  | 'auth_issue'
  | 'resource_pressure'
  | 'manual_disconnect'
  | 'mobile_network';

export type TransportHint = 'websocket' | 'polling';

/**
 * Connection history reported by the transport layer.
 * Read-only input; the engine never mutates it.
 */
export interface ConnectionHistorySnapshot {
  /** Errors seen on this client recently */
  readonly recentFailures: number;
  /** Longest connection the client has held, in milliseconds */
  readonly longestConnectionMs: number;
  /** Server restarts observed */
  readonly serverRestarts: number;
  /** Network type reported by the client ("mobile", "wifi", "unknown", ...) */
  readonly networkType: string;
}

export const EMPTY_HISTORY: ConnectionHistorySnapshot = Object.freeze({
  recentFailures: 0,
  longestConnectionMs: 0,
  serverRestarts: 0,
  networkType: 'unknown',
});

/**
 * Result of analyzing one disconnection event. Frozen once created.
 */
export interface DisconnectAnalysis {
  readonly cause: CauseKind;
  readonly severity: SeverityLevel;
  readonly recoverability: RecoverabilityLevel;
  readonly strategy: StrategyKind;
  readonly backoffMultiplier: number;
  readonly maxAttempts: number;
  /** Ordered, without duplicates */
  readonly contextualFactors: readonly ContextualFactor[];
}

/**
 * One planned retry
 */
export interface ReconnectionScheduleEntry {
  /** 1-based, contiguous */
  attempt: number;
  /** Delay before this attempt in milliseconds */
  delayMs: number;
  transportHint: TransportHint;
  /** Whether the delay came from adaptive timing */
  adaptive: boolean;
}
