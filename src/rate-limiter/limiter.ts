/**
 * Agent Gateway - Main Rate Limiter Service
 * Runs a request through an ordered chain of strategies and keeps aggregate stats
 */

import logger, { logRateLimit } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { ConfigurationError, type Clock } from '../utils/types.js';

import { createTokenBucketLimiter } from './algorithms/token-bucket.js';
import { createSlidingWindowLimiter } from './algorithms/sliding-window.js';
import { createFixedWindowLimiter } from './algorithms/fixed-window.js';
import { isExemptPath, resolveEndpointConfig } from './config.js';
import type {
  KeyFunction,
  RateLimitConfig,
  RateLimitContext,
  RateLimitErrorBody,
  RateLimitHeaders,
  RateLimitResult,
  RateLimitStrategy,
  RateLimiterStats,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Reported as both limit and remaining when a request is not rate limited */
export const BYPASS_SENTINEL = 999;

const BYPASS_RESET_SECONDS = 3600;
const TOP_DENIED_COUNT = 10;

// =============================================================================
// Types
// =============================================================================

export interface RateLimitCheckResult extends RateLimitResult {
  /** Identity key the request was counted against */
  key: string;
  /** Name of the strategy that denied the request, or that reported the lowest remaining */
  strategy?: string;
  /** True when the limiter was disabled or the path exempt */
  bypassed: boolean;
}

export interface NamedStrategy {
  name: string;
  strategy: RateLimitStrategy;
}

export type HourStrategy = 'fixed-window' | 'sliding-window';

export interface RateLimiterOptions {
  /** Strategies in evaluation order; defaults to burst, minute, hour */
  strategies?: NamedStrategy[];
  /** Algorithm for the default hour tier */
  hourStrategy?: HourStrategy;
  /** Token bucket keys untouched for this long are evicted by sweep() */
  keyIdleTtlSeconds?: number;
  clock?: Clock;
}

/**
 * Identity key for a request: the authenticated user when known, else the client IP
 */
export const defaultKeyFunction: KeyFunction = (context) =>
  context.userId ? `user:${context.userId}` : `ip:${context.ip}`;

/**
 * Burst (token bucket), per-minute (sliding window) and per-hour tiers
 */
export function createDefaultStrategies(
  clock: Clock = Date.now,
  hourStrategy: HourStrategy = 'fixed-window'
): NamedStrategy[] {
  const hour =
    hourStrategy === 'sliding-window'
      ? createSlidingWindowLimiter({ windowSeconds: 3600, clock })
      : createFixedWindowLimiter({ windowSeconds: 3600, clock });

  return [
    { name: 'burst', strategy: createTokenBucketLimiter({ clock }) },
    { name: 'minute', strategy: createSlidingWindowLimiter({ windowSeconds: 60, clock }) },
    { name: 'hour', strategy: hour },
  ];
}

// =============================================================================
// Rate Limiter Service Class
// =============================================================================

export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly strategies: NamedStrategy[];
  private readonly clock: Clock;
  private readonly keyIdleTtlSeconds: number;

  private totalRequests = 0;
  private allowedRequests = 0;
  private deniedRequests = 0;
  private readonly deniedByKey = new Map<string, number>();

  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(config: RateLimitConfig, options: RateLimiterOptions = {}) {
    this.config = config;
    this.clock = options.clock ?? Date.now;
    this.keyIdleTtlSeconds = options.keyIdleTtlSeconds ?? 3600;
    this.strategies =
      options.strategies ?? createDefaultStrategies(this.clock, options.hourStrategy);

    const names = new Set<string>();
    for (const { name } of this.strategies) {
      if (names.has(name)) {
        throw new ConfigurationError(`Duplicate rate limit strategy name: ${name}`);
      }
      names.add(name);
    }

    logger.debug('Rate limiter initialized', {
      enabled: config.enabled,
      strategies: this.strategies.map(({ name, strategy }) => `${name}:${strategy.algorithm}`),
      overrides: config.endpointOverrides.length,
    });
  }

  // ===========================================================================
  // Core Rate Limiting
  // ===========================================================================

  /**
   * Check if a request is allowed. Every strategy that runs before a denial
   * has already counted the request.
   */
  public check(context: RateLimitContext, keyFunc: KeyFunction = defaultKeyFunction): RateLimitCheckResult {
    this.totalRequests++;

    if (!this.config.enabled || isExemptPath(this.config, context.path)) {
      this.allowedRequests++;
      return this.createBypassResult();
    }

    const key = keyFunc(context);
    const config = resolveEndpointConfig(this.config, context.path);

    let lowest: { name: string; result: RateLimitResult } | null = null;

    for (const { name, strategy } of this.strategies) {
      let result: RateLimitResult;
      try {
        result = strategy.check(`${key}:${name}`, config);
      } catch (error) {
        logger.error('Rate limit strategy failed', {
          strategy: name,
          key,
          path: context.path,
          error: errorMessage(error),
        });
        result = this.createFailClosedResult(config);
      }

      if (!result.allowed) {
        this.recordDenial(key);
        logRateLimit({
          key,
          path: context.path,
          strategy: name,
          limit: result.limit,
          remaining: result.remaining,
          retryAfter: result.retryAfter,
          blocked: true,
        });
        return { ...result, key, strategy: name, bypassed: false };
      }

      if (lowest === null || result.remaining < lowest.result.remaining) {
        lowest = { name, result };
      }
    }

    this.allowedRequests++;

    if (lowest === null) {
      return { ...this.createBypassResult(), key, bypassed: false };
    }

    return { ...lowest.result, key, strategy: lowest.name, bypassed: false };
  }

  /**
   * Reset every strategy's state for an identity key
   */
  public reset(key: string): void {
    for (const { name, strategy } of this.strategies) {
      strategy.reset(`${key}:${name}`);
    }
    this.deniedByKey.delete(key);
    logger.debug('Rate limit reset', { key });
  }

  // ===========================================================================
  // Response Helpers
  // ===========================================================================

  /**
   * Generate rate limit headers
   */
  public generateHeaders(result: RateLimitResult): RateLimitHeaders {
    const headers: RateLimitHeaders = {
      'X-RateLimit-Limit': String(result.limit),
      'X-RateLimit-Remaining': String(Math.max(0, result.remaining)),
      'X-RateLimit-Reset': String(Math.floor(result.resetAt)),
    };

    if (!result.allowed) {
      headers['Retry-After'] = String(retryAfterSeconds(result.retryAfter));
    }

    return headers;
  }

  /**
   * Generate error response body for 429 responses
   */
  public generateErrorBody(result: RateLimitResult): RateLimitErrorBody {
    return {
      error: 'Rate limit exceeded',
      retry_after: result.retryAfter,
      message: `Too many requests. Please wait ${retryAfterSeconds(result.retryAfter)} seconds.`,
    };
  }

  // ===========================================================================
  // Stats and Housekeeping
  // ===========================================================================

  public getStats(): RateLimiterStats {
    const topDenied = [...this.deniedByKey.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, TOP_DENIED_COUNT)
      .map(([key, denied]) => ({ key, denied }));

    const trackedKeys: Record<string, number> = {};
    for (const { name, strategy } of this.strategies) {
      trackedKeys[name] = strategy.size();
    }

    return {
      totalRequests: this.totalRequests,
      allowedRequests: this.allowedRequests,
      deniedRequests: this.deniedRequests,
      denialRate: this.totalRequests === 0 ? 0 : this.deniedRequests / this.totalRequests,
      topDenied,
      trackedKeys,
    };
  }

  public getConfig(): RateLimitConfig {
    return this.config;
  }

  /**
   * Evict idle per-key state from every strategy
   */
  public sweep(): number {
    let removed = 0;
    for (const { strategy } of this.strategies) {
      removed += strategy.sweep(this.keyIdleTtlSeconds);
    }
    if (removed > 0) {
      logger.debug('Rate limiter swept idle keys', { removed });
    }
    return removed;
  }

  public startSweeper(intervalMs = 60_000): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  public stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private recordDenial(key: string): void {
    this.deniedRequests++;
    this.deniedByKey.set(key, (this.deniedByKey.get(key) ?? 0) + 1);
  }

  private createBypassResult(): RateLimitCheckResult {
    return {
      allowed: true,
      remaining: BYPASS_SENTINEL,
      limit: BYPASS_SENTINEL,
      resetAt: this.clock() / 1000 + BYPASS_RESET_SECONDS,
      retryAfter: null,
      key: '',
      bypassed: true,
    };
  }

  private createFailClosedResult(config: RateLimitConfig): RateLimitResult {
    return {
      allowed: false,
      remaining: 0,
      limit: config.burstSize,
      resetAt: this.clock() / 1000 + 1,
      retryAfter: 1,
    };
  }
}

/**
 * Whole seconds for a Retry-After header, never below one
 */
export function retryAfterSeconds(retryAfter: number | null): number {
  return Math.max(1, Math.ceil(retryAfter ?? 1));
}

export function createRateLimiter(config: RateLimitConfig, options?: RateLimiterOptions): RateLimiter {
  return new RateLimiter(config, options);
}

export default RateLimiter;
