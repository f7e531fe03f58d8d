/**
 * Agent Gateway - Sliding Window Rate Limiter
 * In-memory sliding window log
 *
 * Keeps the timestamp of every admitted request inside the trailing window
 * and prunes on each check. Exact, at O(n) per check in the window size.
 */

import type { Clock } from '../../utils/types.js';
import type { RateLimitConfig, RateLimitResult, RateLimitStrategy } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export type WindowLimitField = 'requestsPerMinute' | 'requestsPerHour';

export interface SlidingWindowOptions {
  windowSeconds: number;
  /** Config field holding the limit; derived from the window length when omitted */
  limitField?: WindowLimitField;
  clock?: Clock;
}

/**
 * Windows shorter than an hour count against the per-minute limit,
 * longer ones against the per-hour limit.
 */
export function defaultLimitField(windowSeconds: number): WindowLimitField {
  return windowSeconds < 3600 ? 'requestsPerMinute' : 'requestsPerHour';
}

// =============================================================================
// Sliding Window Limiter Class
// =============================================================================

export class SlidingWindowLimiter implements RateLimitStrategy {
  public readonly algorithm = 'sliding-window' as const;
  public readonly windowSeconds: number;

  private readonly windows = new Map<string, number[]>();
  private readonly limitField: WindowLimitField;
  private readonly clock: Clock;

  constructor(options: SlidingWindowOptions) {
    this.windowSeconds = options.windowSeconds;
    this.limitField = options.limitField ?? defaultLimitField(options.windowSeconds);
    this.clock = options.clock ?? Date.now;
  }

  public check(key: string, config: RateLimitConfig): RateLimitResult {
    const now = this.clock() / 1000;
    const limit = Math.floor(config[this.limitField]);
    const timestamps = this.prune(key, now);

    if (timestamps.length < limit) {
      timestamps.push(now);
      this.windows.set(key, timestamps);
      return {
        allowed: true,
        remaining: limit - timestamps.length,
        limit,
        resetAt: now + this.windowSeconds,
        retryAfter: null,
      };
    }

    this.windows.set(key, timestamps);
    const oldest = timestamps[0] ?? now;
    const resetAt = oldest + this.windowSeconds;
    return {
      allowed: false,
      remaining: 0,
      limit,
      resetAt,
      retryAfter: Math.max(0, resetAt - now),
    };
  }

  public reset(key: string): void {
    this.windows.delete(key);
  }

  public sweep(_idleTtlSeconds: number): number {
    const now = this.clock() / 1000;
    let removed = 0;
    for (const key of [...this.windows.keys()]) {
      if (this.prune(key, now).length === 0) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  public size(): number {
    return this.windows.size;
  }

  /**
   * Requests currently counted in the window for a key
   */
  public getRequestCount(key: string): number {
    return this.prune(key, this.clock() / 1000).length;
  }

  private prune(key: string, now: number): number[] {
    const cutoff = now - this.windowSeconds;
    const timestamps = (this.windows.get(key) ?? []).filter((t) => t > cutoff);
    if (this.windows.has(key)) {
      this.windows.set(key, timestamps);
    }
    return timestamps;
  }
}

export function createSlidingWindowLimiter(options: SlidingWindowOptions): SlidingWindowLimiter {
  return new SlidingWindowLimiter(options);
}

export default SlidingWindowLimiter;
