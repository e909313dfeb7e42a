/**
 * Global Stats Aggregator
 * Process-wide reconnection counters shared by every client
 */

import type { GlobalReconnectionStats, GlobalStatsSnapshot } from '../types/state.js';
import { PercentileTracker } from './percentile.js';

export class GlobalStatsAggregator {
  private stats: GlobalReconnectionStats = GlobalStatsAggregator.emptyStats();
  private durations = new PercentileTracker();

  private static emptyStats(): GlobalReconnectionStats {
    return {
      totalAttempts: 0,
      successfulReconnections: 0,
      failedReconnections: 0,
      averageReconnectionTimeMs: 0,
    };
  }

  /**
   * Record the outcome of one attempt
   */
  record(success: boolean, durationMs: number): void {
    if (success) {
      this.stats.successfulReconnections++;
    } else {
      this.stats.failedReconnections++;
    }
    this.stats.totalAttempts++;
    // Smoothing filter, not a true mean: each sample weighs half
    this.stats.averageReconnectionTimeMs = (this.stats.averageReconnectionTimeMs + durationMs) / 2;
    this.durations.record(durationMs);
  }

  /**
   * Counters plus derived rates, for telemetry
   */
  snapshot(activeClients: number): GlobalStatsSnapshot {
    return {
      ...this.stats,
      successRate: this.stats.totalAttempts > 0 ? this.stats.successfulReconnections / this.stats.totalAttempts : 0,
      activeClients,
      durationPercentiles: this.durations.getStats(),
      lastUpdated: Date.now(),
    };
  }
}
