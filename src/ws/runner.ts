/**
 * Schedule runner
 * Executes a reconnection schedule and reports every attempt back to the engine
 */

import type { ReconnectionScheduleEntry } from '../types/analysis.js';
import { ErrorCode, ReconnectError, ReconnectKitError } from '../errors/index.js';
import type { ReconnectionManager } from '../manager.js';

/**
 * Runner event handlers
 */
export interface ScheduleRunnerHandlers {
  /** Called before each attempt, after its delay */
  onAttempt?: (entry: ReconnectionScheduleEntry) => void;
  /** Called when an attempt fails */
  onAttemptFailed?: (error: Error, entry: ReconnectionScheduleEntry) => void;
  /** Called when an attempt succeeds */
  onReconnected?: (entry: ReconnectionScheduleEntry, durationMs: number) => void;
  /** Called when every entry failed */
  onExhausted?: (attempts: number) => void;
}

export interface ScheduleRunResult {
  /** "declined" means the schedule was empty: the user has to reconnect */
  outcome: 'connected' | 'declined';
  attempts: number;
  /** Entry that succeeded */
  entry?: ReconnectionScheduleEntry;
}

export type AttemptTracker = Pick<ReconnectionManager, 'trackReconnectionAttempt'>;

export class ScheduleRunner {
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  private rejectWait: ((error: Error) => void) | null = null;
  private aborted = false;
  private running = false;
  private attempts = 0;

  constructor(
    private tracker: AttemptTracker,
    private clientId: string,
    private schedule: readonly ReconnectionScheduleEntry[],
    private handlers: ScheduleRunnerHandlers = {}
  ) {}

  /**
   * Walk the schedule until connect() resolves
   * @throws ReconnectError when every entry failed or abort() was called
   */
  async run(connect: (entry: ReconnectionScheduleEntry) => Promise<void>): Promise<ScheduleRunResult> {
    if (this.schedule.length === 0) {
      return { outcome: 'declined', attempts: 0 };
    }

    this.running = true;
    let lastError: Error | undefined;

    try {
      for (const entry of this.schedule) {
        await this.wait(entry.delayMs);
        this.attempts++;
        this.handlers.onAttempt?.(entry);

        const startedAt = Date.now();
        try {
          await connect(entry);
        } catch (err) {
          lastError = ReconnectKitError.from(err, ErrorCode.RECONNECT_FAILED);
          this.tracker.trackReconnectionAttempt(this.clientId, entry.attempt, false, Date.now() - startedAt);
          this.handlers.onAttemptFailed?.(lastError, entry);
          continue;
        }

        const durationMs = Date.now() - startedAt;
        this.tracker.trackReconnectionAttempt(this.clientId, entry.attempt, true, durationMs);
        this.handlers.onReconnected?.(entry, durationMs);
        return { outcome: 'connected', attempts: this.attempts, entry };
      }
    } finally {
      this.running = false;
    }

    this.handlers.onExhausted?.(this.attempts);
    throw new ReconnectError(
      `Reconnection attempts exhausted for ${this.clientId}`,
      this.clientId,
      this.attempts,
      this.schedule.length,
      { lastError }
    );
  }

  /**
   * Abandon the schedule. A pending run() rejects with an aborted ReconnectError.
   */
  abort(): void {
    this.aborted = true;
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
    this.rejectWait?.(this.abortError());
    this.rejectWait = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  getAttempts(): number {
    return this.attempts;
  }

  private abortError(): ReconnectError {
    return new ReconnectError(`Reconnection aborted for ${this.clientId}`, this.clientId, this.attempts, this.schedule.length, {
      aborted: true,
    });
  }

  private wait(ms: number): Promise<void> {
    if (this.aborted) {
      return Promise.reject(this.abortError());
    }
    return new Promise((resolve, reject) => {
      this.rejectWait = reject;
      this.timeoutId = setTimeout(() => {
        this.timeoutId = null;
        this.rejectWait = null;
        resolve();
      }, ms);
    });
  }
}
