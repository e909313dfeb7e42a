/**
 * Client State Store
 *
 * Rolling reconnection record per client id. Entries are created by the first
 * tracked attempt and removed only by sweep() or reset(). Every method runs
 * synchronously, so a read-modify-write on one client can never interleave
 * with another on the same client.
 */

import type { AttemptRecord, ClientReconnectionState } from '../types/state.js';
import { cloneClientState, emptyClientState } from '../types/state.js';
import type { EngineLogger } from '../types/config.js';
import { DEFAULT_ENGINE_CONFIG } from '../types/config.js';
import type { NotificationSink } from '../events.js';
import type { GlobalStatsAggregator } from '../metrics/stats.js';

export interface ClientStateStoreOptions {
  /** Attempt records kept per client (default: 20) */
  patternLimit?: number;
  /** Idle time after which sweep() drops a client (default: 24h) */
  retentionMs?: number;
  logger?: EngineLogger;
}

export class ClientStateStore {
  private states: Map<string, ClientReconnectionState> = new Map();
  private patternLimit: number;
  private retentionMs: number;
  private logger: EngineLogger;

  constructor(
    private sink: NotificationSink,
    private stats: GlobalStatsAggregator,
    options: ClientStateStoreOptions = {}
  ) {
    this.patternLimit = options.patternLimit ?? DEFAULT_ENGINE_CONFIG.patternLimit;
    this.retentionMs = options.retentionMs ?? DEFAULT_ENGINE_CONFIG.retentionMs;
    this.logger = options.logger ?? DEFAULT_ENGINE_CONFIG.logger;
  }

  /**
   * Record one reconnection attempt for a client, creating its state on first use
   */
  track(clientId: string, attempt: number, success: boolean, durationMs: number): ClientReconnectionState {
    let state = this.states.get(clientId);
    if (!state) {
      state = emptyClientState();
      this.states.set(clientId, state);
    }

    const record: AttemptRecord = {
      attempt,
      success,
      durationMs,
      timestamp: Date.now(),
    };

    state.attempts++;
    state.totalDurationMs += durationMs;
    state.lastAttempt = record;
    if (success) {
      state.successes++;
    } else {
      state.failures++;
    }

    state.patterns.push({ ...record });
    if (state.patterns.length > this.patternLimit) {
      state.patterns.splice(0, state.patterns.length - this.patternLimit);
    }

    this.stats.record(success, durationMs);

    this.logger.log(
      `Reconnection tracked for ${clientId}: attempt ${attempt}, success: ${success}, duration: ${durationMs}ms`
    );

    const copy = cloneClientState(state);
    this.sink.emit('tracked', { clientId, attempt, success, durationMs, state: copy });
    return copy;
  }

  /**
   * Copy of a client's state, or undefined if none is held
   */
  get(clientId: string): ClientReconnectionState | undefined {
    const state = this.states.get(clientId);
    return state ? cloneClientState(state) : undefined;
  }

  has(clientId: string): boolean {
    return this.states.has(clientId);
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * Drop a client's state. Returns whether anything was removed.
   */
  reset(clientId: string): boolean {
    const existed = this.states.delete(clientId);
    this.logger.log(`Reset reconnection state for ${clientId}`);
    this.sink.emit('reset', { clientId, existed });
    return existed;
  }

  /**
   * Remove every client whose last attempt is older than the retention window.
   * Returns the ids removed.
   */
  sweep(now = Date.now()): string[] {
    const cutoff = now - this.retentionMs;
    const evicted: string[] = [];

    for (const [clientId, state] of this.states) {
      if (state.lastAttempt && state.lastAttempt.timestamp < cutoff) {
        this.states.delete(clientId);
        evicted.push(clientId);
        this.logger.log(`Cleaned up old reconnection state for ${clientId}`);
        this.sink.emit('evicted', { clientId, lastAttemptAt: state.lastAttempt.timestamp });
      }
    }

    return evicted;
  }
}
