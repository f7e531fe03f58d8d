/**
 * Agent Gateway - Sliding Window Rate Limiter Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { SlidingWindowLimiter, defaultLimitField } from '../../src/rate-limiter/algorithms/sliding-window.js';
import { createRateLimitConfig } from '../../src/rate-limiter/config.js';

const START_MS = 1_700_000_000_000;

describe('SlidingWindowLimiter', () => {
  let nowMs: number;
  let limiter: SlidingWindowLimiter;
  const config = createRateLimitConfig({ requestsPerMinute: 3, requestsPerHour: 5 });

  const advanceSeconds = (seconds: number): void => {
    nowMs += seconds * 1000;
  };

  beforeEach(() => {
    nowMs = START_MS;
    limiter = new SlidingWindowLimiter({ windowSeconds: 60, clock: () => nowMs });
  });

  it('should pick the limit field from the window length', () => {
    expect(defaultLimitField(60)).toBe('requestsPerMinute');
    expect(defaultLimitField(3600)).toBe('requestsPerHour');
  });

  it('should allow up to the limit within the window', () => {
    const results = [limiter.check('k', config), limiter.check('k', config), limiter.check('k', config)];

    expect(results.map((r) => r.allowed)).toEqual([true, true, true]);
    expect(results.map((r) => r.remaining)).toEqual([2, 1, 0]);
    expect(results[0]?.limit).toBe(3);
    expect(results[0]?.resetAt).toBe(START_MS / 1000 + 60);
  });

  it('should deny the request over the limit until the oldest entry leaves the window', () => {
    limiter.check('k', config);
    advanceSeconds(10);
    limiter.check('k', config);
    advanceSeconds(10);
    limiter.check('k', config);
    advanceSeconds(10);

    const denied = limiter.check('k', config);
    expect(denied.allowed).toBe(false);
    expect(denied.remaining).toBe(0);
    expect(denied.retryAfter).toBe(30);
    expect(denied.resetAt).toBe(START_MS / 1000 + 60);

    advanceSeconds(30);

    const allowed = limiter.check('k', config);
    expect(allowed.allowed).toBe(true);
    expect(allowed.remaining).toBe(0);
  });

  it('should not record denied requests', () => {
    for (let i = 0; i < 5; i++) {
      limiter.check('k', config);
    }

    expect(limiter.getRequestCount('k')).toBe(3);
  });

  it('should use the hourly limit for an hour window', () => {
    const hourly = new SlidingWindowLimiter({ windowSeconds: 3600, clock: () => nowMs });

    const results = Array.from({ length: 6 }, () => hourly.check('k', config));

    expect(results.filter((r) => r.allowed)).toHaveLength(5);
    expect(results[5]?.limit).toBe(5);
    expect(results[5]?.retryAfter).toBe(3600);
  });

  it('should track keys independently', () => {
    for (let i = 0; i < 3; i++) {
      limiter.check('a', config);
    }

    expect(limiter.check('a', config).allowed).toBe(false);
    expect(limiter.check('b', config).allowed).toBe(true);
  });

  it('should sweep keys whose window has emptied', () => {
    limiter.check('old', config);
    advanceSeconds(30);
    limiter.check('recent', config);
    advanceSeconds(31);

    expect(limiter.sweep(0)).toBe(1);
    expect(limiter.size()).toBe(1);
    expect(limiter.getRequestCount('recent')).toBe(1);
  });

  it('should forget a key on reset', () => {
    for (let i = 0; i < 3; i++) {
      limiter.check('k', config);
    }

    limiter.reset('k');

    expect(limiter.check('k', config).allowed).toBe(true);
  });
});
