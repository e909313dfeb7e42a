import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ErrorCode,
  MonitorError,
  ReconnectError,
  ReconnectKitError,
  ValidationError,
} from '../../src/errors/index.js';

describe('ReconnectKitError', () => {
  it('should default to the unknown code', () => {
    const error = new ReconnectKitError('boom');
    expect(error.code).toBe(ErrorCode.UNKNOWN);
    expect(error.name).toBe('ReconnectKitError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should default validation errors to the generic code', () => {
    const error = new ValidationError('bad input');
    expect(error.code).toBe(ErrorCode.VALIDATION_FAILED);
    expect(error.problems).toEqual([]);
  });

  it('should serialize with its cause', () => {
    const cause = new TypeError('not a number');
    const error = new ReconnectKitError('wrapped', ErrorCode.VALIDATION_FAILED, {
      cause,
      context: { field: 'recentFailures' },
    });

    const json = error.toJSON();
    expect(json.name).toBe('ReconnectKitError');
    expect(json.message).toBe('wrapped');
    expect(json.code).toBe(400);
    expect(json.context).toEqual({ field: 'recentFailures' });
    expect(json.cause).toEqual({ name: 'TypeError', message: 'not a number' });
  });

  describe('from', () => {
    it('should pass through existing errors', () => {
      const error = new MonitorError('closed');
      expect(ReconnectKitError.from(error)).toBe(error);
    });

    it('should wrap plain errors', () => {
      const cause = new Error('socket hang up');
      const error = ReconnectKitError.from(cause, ErrorCode.MONITOR_ERROR);
      expect(error.message).toBe('socket hang up');
      expect(error.code).toBe(ErrorCode.MONITOR_ERROR);
      expect(error.cause).toBe(cause);
    });

    it('should wrap strings and other values', () => {
      expect(ReconnectKitError.from('refused').message).toBe('refused');

      const error = ReconnectKitError.from(42);
      expect(error.message).toBe('Unknown error occurred');
      expect(error.context).toEqual({ originalError: 42 });
    });
  });

});

describe('ConfigurationError', () => {
  it('should keep every problem', () => {
    const error = new ConfigurationError('bad', { problems: ['a', 'b'] });
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.problems).toEqual(['a', 'b']);
    expect(error.name).toBe('ConfigurationError');
  });
});

describe('ReconnectError', () => {
  it('should pick its code from the attempt counts', () => {
    expect(new ReconnectError('x', 'phone-1', 2, 5).code).toBe(ErrorCode.RECONNECT_FAILED);
    expect(new ReconnectError('x', 'phone-1', 5, 5).isMaxAttemptsReached()).toBe(true);
    expect(new ReconnectError('x', 'phone-1', 5, 5, { aborted: true }).isAborted()).toBe(true);
  });

  it('should carry the client id in its context', () => {
    const error = new ReconnectError('x', 'phone-1', 1, 3);
    expect(error.context).toEqual({ clientId: 'phone-1', attempts: 1, maxAttempts: 3 });
  });
});
