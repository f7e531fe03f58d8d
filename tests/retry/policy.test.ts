/**
 * Agent Gateway - Retry Policy Tests
 */

import { describe, it, expect, jest } from '@jest/globals';

import { RetryPolicy, type RetryAttemptInfo } from '../../src/retry/policy.js';
import { UpstreamHttpError, UpstreamNetworkError } from '../../src/utils/types.js';

function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: (ms: number) => {
      delays.push(ms);
      return Promise.resolve();
    },
  };
}

describe('RetryPolicy', () => {
  describe('delayFor', () => {
    it('should double from the minimum and cap at the maximum', () => {
      const policy = new RetryPolicy({ maxAttempts: 5, minWaitMs: 1000, maxWaitMs: 3000 });

      expect([0, 1, 2, 3].map((attempt) => policy.delayFor(attempt))).toEqual([1000, 2000, 3000, 3000]);
    });
  });

  describe('execute', () => {
    it('should attempt a 404 exactly once', async () => {
      const { sleep, delays } = recordingSleep();
      const policy = new RetryPolicy({ sleep });
      const notFound = new UpstreamHttpError('openai', 404);
      const fn = jest.fn<(attempt: number) => Promise<string>>().mockRejectedValue(notFound);

      await expect(policy.execute(fn)).rejects.toBe(notFound);

      expect(fn).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it('should retry a 503 twice and return the third attempt', async () => {
      const { sleep, delays } = recordingSleep();
      const policy = new RetryPolicy({ sleep });
      const fn = jest
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(new UpstreamHttpError('openai', 503))
        .mockRejectedValueOnce(new UpstreamHttpError('openai', 503))
        .mockResolvedValueOnce('done');

      await expect(policy.execute(fn)).resolves.toBe('done');

      expect(fn).toHaveBeenCalledTimes(3);
      expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
      expect(delays).toEqual([2000, 4000]);
    });

    it('should re-throw the last error unchanged once attempts run out', async () => {
      const { sleep } = recordingSleep();
      const policy = new RetryPolicy({ maxAttempts: 2, sleep });
      const first = new UpstreamNetworkError('ollama', 'connect ECONNREFUSED');
      const last = new UpstreamNetworkError('ollama', 'socket hang up');
      const fn = jest
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(first)
        .mockRejectedValueOnce(last);

      await expect(policy.execute(fn)).rejects.toBe(last);
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should use a custom retryable predicate', async () => {
      const { sleep } = recordingSleep();
      const policy = new RetryPolicy({ sleep, isRetryable: () => true });
      const fn = jest
        .fn<(attempt: number) => Promise<number>>()
        .mockRejectedValueOnce(new Error('anything'))
        .mockResolvedValueOnce(42);

      await expect(policy.execute(fn)).resolves.toBe(42);
    });

    it('should report each retry to both hooks', async () => {
      const { sleep } = recordingSleep();
      const policyHook = jest.fn<(info: RetryAttemptInfo) => void>();
      const callHook = jest.fn<(info: RetryAttemptInfo) => void>();
      const policy = new RetryPolicy({ sleep, onRetry: policyHook });
      const error = new UpstreamHttpError('claude', 429);
      const fn = jest
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValueOnce(error)
        .mockResolvedValueOnce('ok');

      await policy.execute(fn, { onRetry: callHook });

      expect(policyHook).toHaveBeenCalledWith({ attempt: 0, delayMs: 2000, error });
      expect(callHook).toHaveBeenCalledWith({ attempt: 0, delayMs: 2000, error });
    });

    it('should stop early when the next wait would pass the deadline', async () => {
      let nowMs = 0;
      const sleep = (ms: number): Promise<void> => {
        nowMs += ms;
        return Promise.resolve();
      };
      const policy = new RetryPolicy({
        maxAttempts: 5,
        minWaitMs: 1000,
        maxWaitMs: 10000,
        deadlineMs: 2500,
        sleep,
        clock: () => nowMs,
      });
      const fn = jest
        .fn<(attempt: number) => Promise<string>>()
        .mockRejectedValue(new UpstreamHttpError('openai', 502));

      await expect(policy.execute(fn)).rejects.toBeInstanceOf(UpstreamHttpError);

      // waits of 1000 then 2000 would end at 3000ms, past the 2500ms deadline
      expect(fn).toHaveBeenCalledTimes(2);
    });
  });

  describe('constructor', () => {
    it('should reject invalid bounds', () => {
      expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
      expect(() => new RetryPolicy({ minWaitMs: 500, maxWaitMs: 100 })).toThrow(RangeError);
    });
  });
});
