/**
 * Connection history tracking
 * Builds the ConnectionHistorySnapshot the engine reads on every disconnect
 */

import type { ConnectionHistorySnapshot } from '../types/analysis.js';
import { EMPTY_HISTORY } from '../types/analysis.js';

/**
 * What a client reports about itself
 */
export interface ClientInfo {
  /** "android", "ios", "windows", ... */
  platform?: string;
  /** Explicit network type; wins over the platform guess */
  networkType?: string;
}

export interface ConnectionErrorRecord {
  type: string;
  message?: string;
  timestamp: number;
}

interface ConnectionRecord {
  startTime: number;
  endTime: number | null;
  longestCompletedMs: number;
  errors: ConnectionErrorRecord[];
  clientInfo: ClientInfo;
}

export interface HistoryTrackerOptions {
  /** Errors younger than this count as recent failures (default: 5 minutes) */
  recentWindowMs?: number;
  /** Error records kept per client (default: 50) */
  maxErrors?: number;
  /** Closed sessions older than this are dropped by sweep() (default: 24h) */
  retentionMs?: number;
}

const MOBILE_PLATFORMS = ['android', 'ios'];

export class ConnectionHistoryTracker {
  private records: Map<string, ConnectionRecord> = new Map();
  private serverRestarts = 0;
  private recentWindowMs: number;
  private maxErrors: number;
  private retentionMs: number;

  constructor(options: HistoryTrackerOptions = {}) {
    this.recentWindowMs = options.recentWindowMs ?? 300000;
    this.maxErrors = options.maxErrors ?? 50;
    this.retentionMs = options.retentionMs ?? 24 * 60 * 60 * 1000;
  }

  /**
   * Begin a new session. Errors and the longest finished session carry over.
   */
  startConnection(clientId: string, clientInfo: ClientInfo = {}): void {
    const existing = this.records.get(clientId);
    this.records.set(clientId, {
      startTime: Date.now(),
      endTime: null,
      longestCompletedMs: existing?.longestCompletedMs ?? 0,
      errors: existing?.errors ?? [],
      clientInfo: { ...existing?.clientInfo, ...clientInfo },
    });
  }

  updateClientInfo(clientId: string, clientInfo: ClientInfo): void {
    const record = this.records.get(clientId);
    if (record) {
      record.clientInfo = { ...record.clientInfo, ...clientInfo };
    }
  }

  recordError(clientId: string, type: string, message?: string): void {
    const record = this.records.get(clientId);
    if (!record) return;

    record.errors.push({ type, message, timestamp: Date.now() });
    if (record.errors.length > this.maxErrors) {
      record.errors.splice(0, record.errors.length - this.maxErrors);
    }
  }

  /**
   * Close the current session. Returns its duration in milliseconds.
   */
  endConnection(clientId: string): number {
    const record = this.records.get(clientId);
    if (!record || record.endTime !== null) return 0;

    record.endTime = Date.now();
    const duration = record.endTime - record.startTime;
    record.longestCompletedMs = Math.max(record.longestCompletedMs, duration);
    return duration;
  }

  recordServerRestart(): void {
    this.serverRestarts++;
  }

  getSnapshot(clientId: string): ConnectionHistorySnapshot {
    const record = this.records.get(clientId);
    if (!record) {
      return EMPTY_HISTORY;
    }

    const now = Date.now();
    const currentSession = (record.endTime ?? now) - record.startTime;

    return Object.freeze({
      recentFailures: record.errors.filter((e) => now - e.timestamp < this.recentWindowMs).length,
      longestConnectionMs: Math.max(record.longestCompletedMs, currentSession),
      serverRestarts: this.serverRestarts,
      networkType: ConnectionHistoryTracker.networkTypeOf(record.clientInfo),
    });
  }

  /**
   * Drop clients whose last session closed before the retention window.
   * Open sessions are always kept. Returns the ids removed.
   */
  sweep(now = Date.now()): string[] {
    const cutoff = now - this.retentionMs;
    const removed: string[] = [];

    for (const [clientId, record] of this.records) {
      if (record.endTime !== null && record.endTime < cutoff) {
        this.records.delete(clientId);
        removed.push(clientId);
      }
    }

    return removed;
  }

  get size(): number {
    return this.records.size;
  }

  private static networkTypeOf(info: ClientInfo): string {
    if (info.networkType) {
      return info.networkType;
    }
    if (info.platform && MOBILE_PLATFORMS.includes(info.platform.toLowerCase())) {
      return 'mobile';
    }
    return 'wifi';
  }
}
