/**
 * Agent Gateway - Fixed Window Rate Limiter
 * In-memory counter per aligned time window
 *
 * Windows are aligned to multiples of the window length since the epoch.
 * A client can spend the full limit at the end of one window and again at
 * the start of the next.
 */

import type { Clock } from '../../utils/types.js';
import type { RateLimitConfig, RateLimitResult, RateLimitStrategy } from '../types.js';
import { defaultLimitField, type WindowLimitField } from './sliding-window.js';

// =============================================================================
// Types
// =============================================================================

export interface WindowState {
  count: number;
  /** Unix seconds at which the current window began */
  windowStart: number;
}

export interface FixedWindowOptions {
  windowSeconds: number;
  limitField?: WindowLimitField;
  clock?: Clock;
}

// =============================================================================
// Fixed Window Limiter Class
// =============================================================================

export class FixedWindowLimiter implements RateLimitStrategy {
  public readonly algorithm = 'fixed-window' as const;
  public readonly windowSeconds: number;

  private readonly counters = new Map<string, WindowState>();
  private readonly limitField: WindowLimitField;
  private readonly clock: Clock;

  constructor(options: FixedWindowOptions) {
    this.windowSeconds = options.windowSeconds;
    this.limitField = options.limitField ?? defaultLimitField(options.windowSeconds);
    this.clock = options.clock ?? Date.now;
  }

  public check(key: string, config: RateLimitConfig): RateLimitResult {
    const now = this.clock() / 1000;
    const limit = Math.floor(config[this.limitField]);
    const windowStart = Math.floor(now / this.windowSeconds) * this.windowSeconds;
    const windowEnd = windowStart + this.windowSeconds;

    const stored = this.counters.get(key);
    const count = stored && stored.windowStart === windowStart ? stored.count : 0;

    if (count < limit) {
      this.counters.set(key, { count: count + 1, windowStart });
      return {
        allowed: true,
        remaining: limit - count - 1,
        limit,
        resetAt: windowEnd,
        retryAfter: null,
      };
    }

    this.counters.set(key, { count, windowStart });
    return {
      allowed: false,
      remaining: 0,
      limit,
      resetAt: windowEnd,
      retryAfter: windowEnd - now,
    };
  }

  public reset(key: string): void {
    this.counters.delete(key);
  }

  public sweep(_idleTtlSeconds: number): number {
    const now = this.clock() / 1000;
    let removed = 0;
    for (const [key, state] of this.counters) {
      if (state.windowStart + this.windowSeconds <= now) {
        this.counters.delete(key);
        removed++;
      }
    }
    return removed;
  }

  public size(): number {
    return this.counters.size;
  }

  public getWindowState(key: string): WindowState | undefined {
    const state = this.counters.get(key);
    return state ? { ...state } : undefined;
  }
}

export function createFixedWindowLimiter(options: FixedWindowOptions): FixedWindowLimiter {
  return new FixedWindowLimiter(options);
}

export default FixedWindowLimiter;
