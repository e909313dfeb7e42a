/**
 * Duration percentiles over a rolling window of recent attempts
 */

import type { PercentileStats } from '../types/metrics.js';
import { emptyPercentileStats } from '../types/metrics.js';

/** Attempts kept for percentile calculation */
const DEFAULT_WINDOW = 1000;

export class PercentileTracker {
  private window: number[] = [];
  private sortedCache: number[] | null = null;
  private total = { count: 0, sum: 0, min: Infinity, max: -Infinity, last: 0 };

  constructor(private windowSize = DEFAULT_WINDOW) {}

  record(value: number): void {
    this.total.count++;
    this.total.sum += value;
    this.total.min = Math.min(this.total.min, value);
    this.total.max = Math.max(this.total.max, value);
    this.total.last = value;

    this.window.push(value);
    if (this.window.length > this.windowSize) {
      this.window.shift();
    }
    this.sortedCache = null;
  }

  /**
   * Nearest-rank percentile (0-100) of the window
   */
  percentile(p: number): number {
    const sorted = this.sorted();
    if (sorted.length === 0) return 0;

    const rank = Math.ceil((p / 100) * sorted.length);
    const index = Math.min(Math.max(rank - 1, 0), sorted.length - 1);
    return sorted[index] ?? 0;
  }

  /**
   * Percentiles of the window; min, max and mean over every recorded value
   */
  getStats(): PercentileStats {
    if (this.total.count === 0) {
      return emptyPercentileStats();
    }
    return {
      p50: this.percentile(50),
      p95: this.percentile(95),
      p99: this.percentile(99),
      min: this.total.min,
      max: this.total.max,
      mean: this.total.sum / this.total.count,
      last: this.total.last,
      count: this.total.count,
    };
  }

  private sorted(): number[] {
    if (!this.sortedCache) {
      this.sortedCache = [...this.window].sort((a, b) => a - b);
    }
    return this.sortedCache;
  }
}
