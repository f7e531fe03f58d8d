/**
 * Agent Gateway - Token Bucket Rate Limiter Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import { TokenBucketLimiter } from '../../src/rate-limiter/algorithms/token-bucket.js';
import { createRateLimitConfig } from '../../src/rate-limiter/config.js';

const START_MS = 1_700_000_000_000;

describe('TokenBucketLimiter', () => {
  let nowMs: number;
  let limiter: TokenBucketLimiter;
  const config = createRateLimitConfig({ requestsPerSecond: 2, burstSize: 5 });

  beforeEach(() => {
    nowMs = START_MS;
    limiter = new TokenBucketLimiter({ clock: () => nowMs });
  });

  describe('check', () => {
    it('should allow a new key up to the burst size', () => {
      const results = Array.from({ length: 5 }, () => limiter.check('client', config));

      expect(results.every((r) => r.allowed)).toBe(true);
      expect(results.map((r) => r.remaining)).toEqual([4, 3, 2, 1, 0]);
      expect(results[0]?.limit).toBe(5);
      expect(results[0]?.retryAfter).toBeNull();
    });

    it('should deny the request after the burst in the same instant', () => {
      for (let i = 0; i < 5; i++) {
        limiter.check('client', config);
      }

      const denied = limiter.check('client', config);

      expect(denied.allowed).toBe(false);
      expect(denied.remaining).toBe(0);
      expect(denied.retryAfter).toBe(0.5);
      expect(denied.resetAt).toBe(START_MS / 1000 + 0.5);
    });

    it('should allow exactly one more request after waiting 1/rate seconds', () => {
      for (let i = 0; i < 5; i++) {
        limiter.check('client', config);
      }
      expect(limiter.check('client', config).allowed).toBe(false);

      nowMs += 500;

      expect(limiter.check('client', config).allowed).toBe(true);
      expect(limiter.check('client', config).allowed).toBe(false);
    });

    it('should not consume tokens on denial', () => {
      for (let i = 0; i < 5; i++) {
        limiter.check('client', config);
      }

      limiter.check('client', config);
      limiter.check('client', config);

      expect(limiter.getBucketState('client')?.tokens).toBe(0);
    });

    it('should never refill above the burst size', () => {
      limiter.check('client', config);
      nowMs += 60_000;

      const result = limiter.check('client', config);

      expect(result.allowed).toBe(true);
      expect(result.remaining).toBe(4);
    });

    it('should set resetAt to the time of the next token', () => {
      const result = limiter.check('client', config);
      expect(result.resetAt).toBe(START_MS / 1000 + 0.5);
    });

    it('should keep separate buckets per key', () => {
      for (let i = 0; i < 5; i++) {
        limiter.check('a', config);
      }

      expect(limiter.check('a', config).allowed).toBe(false);
      expect(limiter.check('b', config).allowed).toBe(true);
    });

    it('should deny without dividing by zero when the rate is not positive', () => {
      const zeroRate = { ...config, requestsPerSecond: 0 };

      const result = limiter.check('client', zeroRate);

      expect(result.allowed).toBe(false);
      expect(result.retryAfter).toBe(1);
    });
  });

  describe('reset', () => {
    it('should give the key a full bucket again', () => {
      for (let i = 0; i < 5; i++) {
        limiter.check('client', config);
      }

      limiter.reset('client');

      expect(limiter.check('client', config).remaining).toBe(4);
    });
  });

  describe('sweep', () => {
    it('should evict buckets idle for at least the ttl', () => {
      limiter.check('idle', config);
      nowMs += 30_000;
      limiter.check('active', config);
      nowMs += 30_000;

      const removed = limiter.sweep(60);

      expect(removed).toBe(1);
      expect(limiter.size()).toBe(1);
      expect(limiter.getBucketState('idle')).toBeUndefined();
      expect(limiter.getBucketState('active')).toBeDefined();
    });
  });
});
