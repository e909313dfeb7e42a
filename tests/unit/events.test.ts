import { describe, it, expect, vi } from 'vitest';
import { ReconnectionEventEmitter, type ResetEvent } from '../../src/events.js';
import { PercentileTracker } from '../../src/metrics/percentile.js';

describe('ReconnectionEventEmitter', () => {
  const silent = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

  it('should unsubscribe through the returned function', () => {
    const emitter = new ReconnectionEventEmitter(silent());
    const handler = vi.fn();
    const off = emitter.on('reset', handler);

    emitter.emit('reset', { clientId: 'a', existed: true });
    off();
    emitter.emit('reset', { clientId: 'a', existed: false });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should fire once listeners a single time', () => {
    const emitter = new ReconnectionEventEmitter(silent());
    const seen: ResetEvent[] = [];
    emitter.once('reset', (e) => seen.push(e));

    emitter.emit('reset', { clientId: 'a', existed: true });
    emitter.emit('reset', { clientId: 'b', existed: true });

    expect(seen).toEqual([{ clientId: 'a', existed: true }]);
  });

  it('should keep delivering after a handler throws', () => {
    const logger = silent();
    const emitter = new ReconnectionEventEmitter(logger);
    const failure = new Error('handler failed');
    const after = vi.fn();
    emitter.on('evicted', () => {
      throw failure;
    });
    emitter.on('evicted', after);

    emitter.emit('evicted', { clientId: 'a', lastAttemptAt: 0 });

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('Error in event handler for evicted:', failure);
  });
});

describe('PercentileTracker', () => {
  it('should report zeros when empty', () => {
    expect(new PercentileTracker().getStats()).toEqual({
      p50: 0,
      p95: 0,
      p99: 0,
      min: 0,
      max: 0,
      mean: 0,
      last: 0,
      count: 0,
    });
  });

  it('should compute nearest-rank percentiles', () => {
    const tracker = new PercentileTracker();
    for (let value = 100; value >= 1; value--) {
      tracker.record(value);
    }

    const stats = tracker.getStats();
    expect(stats.p50).toBe(50);
    expect(stats.p95).toBe(95);
    expect(stats.p99).toBe(99);
    expect(stats.min).toBe(1);
    expect(stats.max).toBe(100);
    expect(stats.mean).toBe(50.5);
    expect(stats.last).toBe(1);
    expect(stats.count).toBe(100);
  });

  it('should rank only the most recent window', () => {
    const tracker = new PercentileTracker(3);
    for (let value = 1; value <= 5; value++) {
      tracker.record(value);
    }

    expect(tracker.percentile(50)).toBe(4);
    expect(tracker.percentile(100)).toBe(5);
    expect(tracker.getStats().min).toBe(1);
    expect(tracker.getStats().count).toBe(5);
  });
});
