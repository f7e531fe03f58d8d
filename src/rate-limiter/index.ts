/**
 * Agent Gateway - Rate Limiter Module
 * In-memory, multi-strategy rate limiting for the gateway's HTTP surface
 *
 * Features:
 * - Token bucket, sliding window and fixed window strategies
 * - Per-user or per-IP keys, per-endpoint overrides, exempt paths
 * - Express middleware with X-RateLimit-* headers
 */

export {
  RateLimiter,
  createRateLimiter,
  createDefaultStrategies,
  defaultKeyFunction,
  retryAfterSeconds,
  BYPASS_SENTINEL,
  type RateLimitCheckResult,
  type RateLimiterOptions,
  type NamedStrategy,
  type HourStrategy,
} from './limiter.js';

export {
  createRateLimitConfig,
  resolveEndpointConfig,
  findEndpointOverride,
  isExemptPath,
  DEFAULT_RATE_LIMIT_CONFIG,
  DEFAULT_EXEMPT_PATHS,
  type RateLimitConfigInput,
} from './config.js';

export * from './algorithms/index.js';

export {
  createRateLimitMiddleware,
  extractClientIP,
  type RateLimitMiddlewareOptions,
} from './middleware.js';

export type {
  RateLimitAlgorithm,
  RateLimitConfig,
  RateLimitContext,
  RateLimitResult,
  RateLimitStrategy,
  RateLimitHeaders,
  RateLimitErrorBody,
  RateLimiterStats,
  EndpointOverride,
  KeyFunction,
} from './types.js';
