/**
 * Metrics types
 */

/**
 * Percentile statistics for a metric
 */
export interface PercentileStats {
  /** 50th percentile (median) */
  p50: number;
  /** 95th percentile */
  p95: number;
  /** 99th percentile */
  p99: number;
  /** Minimum value */
  min: number;
  /** Maximum value */
  max: number;
  /** Mean value */
  mean: number;
  /** Last recorded value */
  last: number;
  /** Number of samples */
  count: number;
}

/**
 * Create empty percentile stats
 */
export function emptyPercentileStats(): PercentileStats {
  return {
    p50: 0,
    p95: 0,
    p99: 0,
    min: 0,
    max: 0,
    mean: 0,
    last: 0,
    count: 0,
  };
}
