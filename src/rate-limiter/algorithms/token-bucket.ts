/**
 * Agent Gateway - Token Bucket Rate Limiter
 * In-memory token bucket with lazy refill
 *
 * Tokens are added continuously at `requestsPerSecond` up to `burstSize`.
 * Each request consumes one token; a request that finds less than one
 * token is denied without consuming anything.
 */

import type { Clock } from '../../utils/types.js';
import type { RateLimitConfig, RateLimitResult, RateLimitStrategy } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface BucketState {
  tokens: number;
  /** Unix seconds of the last refill */
  lastRefill: number;
}

export interface TokenBucketOptions {
  clock?: Clock;
}

// =============================================================================
// Token Bucket Limiter Class
// =============================================================================

/**
 * Token Bucket Rate Limiter
 *
 * Pros:
 * - Allows controlled bursts up to bucket capacity
 * - Smooth rate limiting over time
 *
 * Cons:
 * - A burst can exhaust the bucket, then requests are paced at the refill rate
 */
export class TokenBucketLimiter implements RateLimitStrategy {
  public readonly algorithm = 'token-bucket' as const;

  private readonly buckets = new Map<string, BucketState>();
  private readonly clock: Clock;

  constructor(options: TokenBucketOptions = {}) {
    this.clock = options.clock ?? Date.now;
  }

  public check(key: string, config: RateLimitConfig): RateLimitResult {
    const now = this.clock() / 1000;
    const rate = config.requestsPerSecond;
    const capacity = config.burstSize;

    if (!(rate > 0)) {
      return { allowed: false, remaining: 0, limit: capacity, resetAt: now + 1, retryAfter: 1 };
    }

    // A new key starts with a full bucket
    const state = this.buckets.get(key) ?? { tokens: capacity, lastRefill: now };
    const elapsed = Math.max(0, now - state.lastRefill);
    const tokens = Math.min(capacity, state.tokens + elapsed * rate);

    if (tokens >= 1) {
      const left = tokens - 1;
      this.buckets.set(key, { tokens: left, lastRefill: now });
      return {
        allowed: true,
        remaining: Math.floor(left),
        limit: capacity,
        resetAt: now + 1 / rate,
        retryAfter: null,
      };
    }

    this.buckets.set(key, { tokens, lastRefill: now });
    const retryAfter = (1 - tokens) / rate;
    return {
      allowed: false,
      remaining: 0,
      limit: capacity,
      resetAt: now + retryAfter,
      retryAfter,
    };
  }

  public reset(key: string): void {
    this.buckets.delete(key);
  }

  public sweep(idleTtlSeconds: number): number {
    const cutoff = this.clock() / 1000 - idleTtlSeconds;
    let removed = 0;
    for (const [key, state] of this.buckets) {
      if (state.lastRefill <= cutoff) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  public size(): number {
    return this.buckets.size;
  }

  /**
   * Current bucket contents without consuming a token
   */
  public getBucketState(key: string): BucketState | undefined {
    const state = this.buckets.get(key);
    return state ? { ...state } : undefined;
  }
}

export function createTokenBucketLimiter(options?: TokenBucketOptions): TokenBucketLimiter {
  return new TokenBucketLimiter(options);
}

export default TokenBucketLimiter;
