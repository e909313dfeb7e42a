/**
 * Reconnection engine events
 * Type-safe event definitions for telemetry subscribers
 */

import type {
  ConnectionHistorySnapshot,
  DisconnectAnalysis,
  ReconnectionScheduleEntry,
} from './types/analysis.js';
import type { ClientReconnectionState } from './types/state.js';
import type { EngineLogger } from './types/config.js';
import type { ReconnectionGuidance } from './engine/guidance.js';

/**
 * A reconnection attempt was tracked
 */
export interface TrackedEvent {
  clientId: string;
  attempt: number;
  success: boolean;
  durationMs: number;
  /** Copy of the client's state after the update */
  state: ClientReconnectionState;
}

/**
 * A disconnect was analyzed
 */
export interface AnalyzedEvent {
  clientId: string;
  reason: string;
  history: ConnectionHistorySnapshot;
  analysis: DisconnectAnalysis;
}

/**
 * Client state was swept for inactivity
 */
export interface EvictedEvent {
  clientId: string;
  /** Timestamp of the client's last tracked attempt */
  lastAttemptAt: number;
}

/**
 * Client state was reset on request
 */
export interface ResetEvent {
  clientId: string;
  /** Whether there was state to remove */
  existed: boolean;
}

/**
 * A monitored socket closed and a plan was produced for it
 */
export interface DisconnectAnalyzedEvent {
  clientId: string;
  code: number;
  reason: string;
  analysis: DisconnectAnalysis;
  schedule: ReconnectionScheduleEntry[];
  guidance: ReconnectionGuidance;
}

/**
 * Event map for type-safe event handling
 */
export interface ReconnectionEventMap {
  tracked: TrackedEvent;
  analyzed: AnalyzedEvent;
  evicted: EvictedEvent;
  reset: ResetEvent;
  disconnectAnalyzed: DisconnectAnalyzedEvent;
}

/**
 * Event handler type
 */
export type ReconnectionEventHandler<K extends keyof ReconnectionEventMap> = (
  event: ReconnectionEventMap[K]
) => void;

type HandlerSets = {
  [K in keyof ReconnectionEventMap]: Set<ReconnectionEventHandler<K>>;
};

/**
 * Where engine components publish events
 */
export interface NotificationSink {
  emit<K extends keyof ReconnectionEventMap>(event: K, data: ReconnectionEventMap[K]): void;
}

/**
 * Type-safe event emitter for engine events
 */
export class ReconnectionEventEmitter implements NotificationSink {
  private handlers: HandlerSets = {
    tracked: new Set(),
    analyzed: new Set(),
    evicted: new Set(),
    reset: new Set(),
    disconnectAnalyzed: new Set(),
  };

  constructor(private logger: EngineLogger = console) {}

  /**
   * Add event listener
   */
  on<K extends keyof ReconnectionEventMap>(event: K, handler: ReconnectionEventHandler<K>): () => void {
    this.handlers[event].add(handler);

    // Return unsubscribe function
    return () => this.off(event, handler);
  }

  /**
   * Add one-time event listener
   */
  once<K extends keyof ReconnectionEventMap>(event: K, handler: ReconnectionEventHandler<K>): () => void {
    const wrappedHandler: ReconnectionEventHandler<K> = (e) => {
      this.off(event, wrappedHandler);
      handler(e);
    };

    return this.on(event, wrappedHandler);
  }

  /**
   * Remove event listener
   */
  off<K extends keyof ReconnectionEventMap>(event: K, handler: ReconnectionEventHandler<K>): void {
    this.handlers[event].delete(handler);
  }

  /**
   * Emit event
   */
  emit<K extends keyof ReconnectionEventMap>(event: K, data: ReconnectionEventMap[K]): void {
    for (const handler of [...this.handlers[event]]) {
      try {
        handler(data);
      } catch (err) {
        this.logger.error(`Error in event handler for ${String(event)}:`, err);
      }
    }
  }
}
