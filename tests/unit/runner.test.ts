import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ScheduleRunner, type AttemptTracker } from '../../src/ws/runner.js';
import { ReconnectError } from '../../src/errors/index.js';
import type { ReconnectionScheduleEntry } from '../../src/types/analysis.js';

const SCHEDULE: ReconnectionScheduleEntry[] = [
  { attempt: 1, delayMs: 100, transportHint: 'polling', adaptive: false },
  { attempt: 2, delayMs: 200, transportHint: 'websocket', adaptive: false },
  { attempt: 3, delayMs: 300, transportHint: 'polling', adaptive: false },
];

describe('ScheduleRunner', () => {
  let track: Mock;
  let tracker: AttemptTracker;

  beforeEach(() => {
    vi.useFakeTimers();
    track = vi.fn();
    tracker = { trackReconnectionAttempt: track };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should decline an empty schedule without tracking anything', async () => {
    const runner = new ScheduleRunner(tracker, 'phone-1', []);
    const connect = vi.fn(() => Promise.resolve());

    await expect(runner.run(connect)).resolves.toEqual({ outcome: 'declined', attempts: 0 });
    expect(connect).not.toHaveBeenCalled();
    expect(track).not.toHaveBeenCalled();
  });

  it('should wait each delay and stop at the first success', async () => {
    const onAttempt = vi.fn();
    const onAttemptFailed = vi.fn();
    const onReconnected = vi.fn();
    const runner = new ScheduleRunner(tracker, 'phone-1', SCHEDULE, {
      onAttempt,
      onAttemptFailed,
      onReconnected,
    });
    const connect = vi
      .fn<(entry: ReconnectionScheduleEntry) => Promise<void>>()
      .mockRejectedValueOnce(new Error('refused'))
      .mockResolvedValueOnce(undefined);

    const pending = runner.run(connect);
    expect(runner.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(99);
    expect(connect).not.toHaveBeenCalled();

    await vi.runAllTimersAsync();
    const result = await pending;

    expect(result).toEqual({ outcome: 'connected', attempts: 2, entry: SCHEDULE[1] });
    expect(connect).toHaveBeenCalledTimes(2);
    expect(onAttempt).toHaveBeenCalledTimes(2);
    expect(onAttemptFailed).toHaveBeenCalledTimes(1);
    expect(onReconnected).toHaveBeenCalledWith(SCHEDULE[1], 0);
    expect(track.mock.calls).toEqual([
      ['phone-1', 1, false, 0],
      ['phone-1', 2, true, 0],
    ]);
    expect(runner.isRunning()).toBe(false);
  });

  it('should throw a max-attempts error with the last failure when exhausted', async () => {
    const onExhausted = vi.fn();
    const runner = new ScheduleRunner(tracker, 'phone-1', SCHEDULE, { onExhausted });
    let calls = 0;
    const connect = () => Promise.reject(new Error(`refused ${++calls}`));

    const outcome = runner.run(connect).catch((error: unknown) => error);
    await vi.runAllTimersAsync();
    const error = await outcome;

    expect(error).toBeInstanceOf(ReconnectError);
    if (!(error instanceof ReconnectError)) return;
    expect(error.message).toBe('Reconnection attempts exhausted for phone-1');
    expect(error.isMaxAttemptsReached()).toBe(true);
    expect(error.attempts).toBe(3);
    expect(error.lastError?.message).toBe('refused 3');
    expect(onExhausted).toHaveBeenCalledWith(3);
    expect(track).toHaveBeenCalledTimes(3);
  });

  it('should wrap non-error rejections', async () => {
    const runner = new ScheduleRunner(tracker, 'phone-1', SCHEDULE.slice(0, 1));
    const connect = () => Promise.reject('socket hang up');

    const outcome = runner.run(connect).catch((error: unknown) => error);
    await vi.runAllTimersAsync();
    const error = await outcome;

    expect(error).toBeInstanceOf(ReconnectError);
    if (!(error instanceof ReconnectError)) return;
    expect(error.lastError).toBeInstanceOf(Error);
    expect(error.lastError?.message).toBe('socket hang up');
  });

  it('should reject a pending run when aborted', async () => {
    const runner = new ScheduleRunner(tracker, 'phone-1', SCHEDULE);
    const connect = vi.fn(() => Promise.resolve());

    const outcome = runner.run(connect).catch((error: unknown) => error);
    runner.abort();
    const error = await outcome;

    expect(error).toBeInstanceOf(ReconnectError);
    if (!(error instanceof ReconnectError)) return;
    expect(error.isAborted()).toBe(true);
    expect(error.message).toBe('Reconnection aborted for phone-1');
    expect(connect).not.toHaveBeenCalled();
    expect(runner.getAttempts()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should stop between attempts when aborted after a failure', async () => {
    const runner = new ScheduleRunner(tracker, 'phone-1', SCHEDULE, {
      onAttemptFailed: () => runner.abort(),
    });
    const connect = vi.fn(() => Promise.reject(new Error('refused')));

    const outcome = runner.run(connect).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(100);
    const error = await outcome;

    expect(error).toBeInstanceOf(ReconnectError);
    if (!(error instanceof ReconnectError)) return;
    expect(error.isAborted()).toBe(true);
    expect(error.attempts).toBe(1);
    expect(connect).toHaveBeenCalledTimes(1);
  });
});
