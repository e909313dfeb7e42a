/**
 * adaptive-reconnect
 *
 * Decides why a real-time connection dropped, how aggressively to retry and
 * when each retry fires, learning from every client's reconnection history.
 *
 * @example
 * ```typescript
 * import { ReconnectionManager, DisconnectMonitor } from 'adaptive-reconnect';
 * import { WebSocketServer } from 'ws';
 *
 * const manager = new ReconnectionManager();
 * manager.startCleanupTimer();
 *
 * const monitor = new DisconnectMonitor(manager);
 * monitor.watch(new WebSocketServer({ port: 3001 }));
 *
 * manager.on('disconnectAnalyzed', ({ clientId, guidance }) => {
 *   console.log(clientId, guidance.strategy, guidance.estimatedDelayMs);
 * });
 * ```
 */

// Types
export type {
  CauseKind,
  SeverityLevel,
  RecoverabilityLevel,
  StrategyKind,
  ContextualFactor,
  TransportHint,
  ConnectionHistorySnapshot,
  DisconnectAnalysis,
  ReconnectionScheduleEntry,
} from './types/analysis.js';
export { CAUSE_KINDS, STRATEGY_KINDS, EMPTY_HISTORY } from './types/analysis.js';

export type {
  AttemptRecord,
  ClientReconnectionState,
  GlobalReconnectionStats,
  GlobalStatsSnapshot,
  RecommendationType,
  RecommendationPriority,
  ReconnectionRecommendation,
} from './types/state.js';

export type { PercentileStats } from './types/metrics.js';
export { emptyPercentileStats } from './types/metrics.js';

export type { EngineLogger, ReconnectionEngineConfig, ConfigValidationResult } from './types/config.js';
export {
  DEFAULT_ENGINE_CONFIG,
  MAX_RETRY_DELAY_MS,
  createEngineConfig,
  validateEngineConfig,
} from './types/config.js';

// Errors
export * from './errors/index.js';

// Engine
export { CAUSE_TABLE, classifyCause } from './engine/classifier.js';
export { assessSeverity, assessRecoverability } from './engine/assessor.js';
export { selectStrategy, type StrategySelection } from './engine/strategy.js';
export { adjustForHistory, LONG_CONNECTION_MS, type AdjustableParameters } from './engine/adjuster.js';
export { generateSchedule, adaptiveBaseDelay, totalScheduledDelay } from './engine/schedule.js';
export { analyzeDisconnect } from './engine/analyzer.js';
export { buildGuidance, type ReconnectionGuidance } from './engine/guidance.js';
export {
  validateHistorySnapshot,
  parseHistorySnapshot,
  validateAnalysis,
  assertSchedulable,
  type ValidationResult,
} from './engine/validation.js';

// State and metrics
export { ClientStateStore, type ClientStateStoreOptions } from './state/store.js';
export { recommend, predictSuccess, DEFAULT_SUCCESS_PROBABILITY } from './state/advisor.js';
export { GlobalStatsAggregator } from './metrics/stats.js';
export { PercentileTracker } from './metrics/percentile.js';

// Events
export { ReconnectionEventEmitter } from './events.js';
export type {
  NotificationSink,
  ReconnectionEventMap,
  ReconnectionEventHandler,
  TrackedEvent,
  AnalyzedEvent,
  EvictedEvent,
  ResetEvent,
  DisconnectAnalyzedEvent,
} from './events.js';

// Connection history
export {
  ConnectionHistoryTracker,
  type ClientInfo,
  type ConnectionErrorRecord,
  type HistoryTrackerOptions,
} from './history/tracker.js';

// WebSocket integration
export {
  ScheduleRunner,
  type ScheduleRunnerHandlers,
  type ScheduleRunResult,
  type AttemptTracker,
} from './ws/runner.js';
export { DisconnectMonitor, describeCloseCode, type DisconnectMonitorOptions } from './ws/monitor.js';

// Main entry point
export { ReconnectionManager, createReconnectionManager, type ReconnectionPlan } from './manager.js';

// Version
export const VERSION = '0.1.0';
