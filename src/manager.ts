/**
 * ReconnectionManager - main entry point for adaptive-reconnect
 */

import type {
  ConnectionHistorySnapshot,
  DisconnectAnalysis,
  ReconnectionScheduleEntry,
  StrategyKind,
} from './types/analysis.js';
import { EMPTY_HISTORY } from './types/analysis.js';
import type {
  ClientReconnectionState,
  GlobalStatsSnapshot,
  ReconnectionRecommendation,
} from './types/state.js';
import type { EngineLogger, ReconnectionEngineConfig } from './types/config.js';
import { createEngineConfig } from './types/config.js';
import { analyzeDisconnect } from './engine/analyzer.js';
import { generateSchedule } from './engine/schedule.js';
import { assertSchedulable } from './engine/validation.js';
import { buildGuidance, type ReconnectionGuidance } from './engine/guidance.js';
import { ClientStateStore } from './state/store.js';
import { predictSuccess, recommend } from './state/advisor.js';
import { GlobalStatsAggregator } from './metrics/stats.js';
import { ConnectionHistoryTracker } from './history/tracker.js';
import {
  ReconnectionEventEmitter,
  type ReconnectionEventHandler,
  type ReconnectionEventMap,
} from './events.js';

/**
 * Everything the transport layer needs to act on a disconnect
 */
export interface ReconnectionPlan {
  analysis: DisconnectAnalysis;
  schedule: ReconnectionScheduleEntry[];
  guidance: ReconnectionGuidance;
}

/**
 * ReconnectionManager - decides why a client dropped, how to retry and when,
 * and learns from every attempt reported back.
 *
 * @example
 * ```typescript
 * const manager = new ReconnectionManager();
 * manager.on('tracked', (e) => console.log(e.clientId, e.state.attempts));
 *
 * const { schedule } = manager.planReconnection('phone-1', 'ping timeout', {
 *   recentFailures: 1,
 *   longestConnectionMs: 60000,
 *   serverRestarts: 0,
 *   networkType: 'wifi',
 * });
 *
 * // ...after each retry the transport executes:
 * manager.trackReconnectionAttempt('phone-1', 1, true, 420);
 * ```
 */
export class ReconnectionManager {
  private config: Required<ReconnectionEngineConfig>;
  private logger: EngineLogger;
  private events: ReconnectionEventEmitter;
  private stats: GlobalStatsAggregator;
  private store: ClientStateStore;
  private history: ConnectionHistoryTracker;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: ReconnectionEngineConfig = {}) {
    this.config = createEngineConfig(config);
    this.logger = this.config.logger;
    this.events = new ReconnectionEventEmitter(this.logger);
    this.stats = new GlobalStatsAggregator();
    this.store = new ClientStateStore(this.events, this.stats, {
      patternLimit: this.config.patternLimit,
      retentionMs: this.config.retentionMs,
      logger: this.logger,
    });
    this.history = new ConnectionHistoryTracker({ retentionMs: this.config.retentionMs });
  }

  /**
   * Classify a disconnect and choose retry parameters for it
   */
  analyzeDisconnection(
    clientId: string,
    reason: string,
    history: ConnectionHistorySnapshot = EMPTY_HISTORY
  ): DisconnectAnalysis {
    const analysis = analyzeDisconnect(reason, history);

    this.logger.log(`Disconnection analysis for ${clientId}:`, {
      cause: analysis.cause,
      severity: analysis.severity,
      strategy: analysis.strategy,
      maxAttempts: analysis.maxAttempts,
    });
    this.events.emit('analyzed', { clientId, reason, history, analysis });

    return analysis;
  }

  /**
   * Expand an analysis into concrete retries
   * @throws ValidationError if the analysis or delay did not come from this engine and is malformed
   */
  generateReconnectionSchedule(
    analysis: DisconnectAnalysis,
    baseDelayMs = this.config.baseDelayMs
  ): ReconnectionScheduleEntry[] {
    assertSchedulable(analysis, baseDelayMs);
    return generateSchedule(analysis, baseDelayMs);
  }

  /**
   * Analysis, schedule and client guidance in one call
   */
  planReconnection(
    clientId: string,
    reason: string,
    history: ConnectionHistorySnapshot = EMPTY_HISTORY,
    baseDelayMs = this.config.baseDelayMs
  ): ReconnectionPlan {
    const analysis = this.analyzeDisconnection(clientId, reason, history);
    const schedule = this.generateReconnectionSchedule(analysis, baseDelayMs);
    return { analysis, schedule, guidance: buildGuidance(analysis, schedule) };
  }

  /**
   * Report the outcome of one reconnection attempt
   */
  trackReconnectionAttempt(
    clientId: string,
    attempt: number,
    success: boolean,
    durationMs: number
  ): ClientReconnectionState {
    return this.store.track(clientId, attempt, success, durationMs);
  }

  getReconnectionRecommendations(clientId: string): ReconnectionRecommendation[] {
    return recommend(this.store.get(clientId));
  }

  predictReconnectionSuccess(clientId: string, proposedStrategy: StrategyKind): number {
    return predictSuccess(this.store.get(clientId), proposedStrategy);
  }

  getGlobalStats(): GlobalStatsSnapshot {
    return this.stats.snapshot(this.store.size);
  }

  getClientState(clientId: string): ClientReconnectionState | undefined {
    return this.store.get(clientId);
  }

  resetClientState(clientId: string): boolean {
    return this.store.reset(clientId);
  }

  /**
   * Sweep client state idle past the retention window, and connection
   * history whose last session closed before it. Returns the evicted client ids.
   */
  cleanup(): string[] {
    const evicted = this.store.sweep();
    const dropped = this.history.sweep();
    if (dropped.length > 0) {
      this.logger.log(`Dropped connection history for ${dropped.length} closed clients`);
    }
    return evicted;
  }

  /**
   * Run cleanup() every cleanupIntervalMs until stop()
   */
  startCleanupTimer(): void {
    if (this.cleanupTimer) {
      return;
    }
    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  /**
   * Stop the periodic sweep
   */
  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  on<K extends keyof ReconnectionEventMap>(event: K, handler: ReconnectionEventHandler<K>): () => void {
    return this.events.on(event, handler);
  }

  once<K extends keyof ReconnectionEventMap>(event: K, handler: ReconnectionEventHandler<K>): () => void {
    return this.events.once(event, handler);
  }

  off<K extends keyof ReconnectionEventMap>(event: K, handler: ReconnectionEventHandler<K>): void {
    this.events.off(event, handler);
  }

  /**
   * Publish an event on this manager's channel (used by attached monitors)
   */
  emit<K extends keyof ReconnectionEventMap>(event: K, data: ReconnectionEventMap[K]): void {
    this.events.emit(event, data);
  }

  /**
   * Connection history read by attached monitors and swept by cleanup()
   */
  getHistory(): ConnectionHistoryTracker {
    return this.history;
  }

  /**
   * Logger shared with attached components
   */
  getLogger(): EngineLogger {
    return this.logger;
  }
}

/**
 * Create a new ReconnectionManager instance
 */
export function createReconnectionManager(config?: ReconnectionEngineConfig): ReconnectionManager {
  return new ReconnectionManager(config);
}
