/**
 * Agent Gateway - Rate Limiter Type Definitions
 */

// =============================================================================
// Core Rate Limiting Types
// =============================================================================

/**
 * Supported rate limiting algorithms
 */
export type RateLimitAlgorithm = 'token-bucket' | 'sliding-window' | 'fixed-window';

/**
 * Limit overrides applied to requests whose path starts with `prefix`
 */
export interface EndpointOverride {
  prefix: string;
  requestsPerSecond?: number;
  requestsPerMinute?: number;
  requestsPerHour?: number;
  burstSize?: number;
}

/**
 * Per-scope rate limit policy. Instances are frozen; overrides derive a new one.
 */
export interface RateLimitConfig {
  readonly requestsPerSecond: number;
  readonly requestsPerMinute: number;
  readonly requestsPerHour: number;
  /** Token bucket capacity */
  readonly burstSize: number;
  readonly enabled: boolean;
  /** First matching prefix wins, so order matters */
  readonly endpointOverrides: readonly EndpointOverride[];
  readonly exemptPaths: readonly string[];
}

/**
 * Result of a rate limit check
 */
export interface RateLimitResult {
  /** Whether the request is allowed */
  allowed: boolean;
  /** Requests left under the limit that applied; may be negative before clamping */
  remaining: number;
  /** Maximum requests allowed under the limit that applied */
  limit: number;
  /** When the limit resets (Unix timestamp in seconds) */
  resetAt: number;
  /** Seconds to wait before retrying; null whenever the request was allowed */
  retryAfter: number | null;
}

/**
 * Request attributes the limiter needs
 */
export interface RateLimitContext {
  /** Client IP address */
  ip: string;
  /** Authenticated user id, takes precedence over the IP for keying */
  userId?: string;
  /** Request path */
  path: string;
  /** HTTP method */
  method?: string;
}

/**
 * Derives the identity portion of the state key from a request
 */
export type KeyFunction = (context: RateLimitContext) => string;

// =============================================================================
// Strategy Interface
// =============================================================================

/**
 * One rate limiting algorithm holding per-key state in memory.
 * `check` is synchronous so a check-and-update on a key never interleaves
 * with another request's check.
 */
export interface RateLimitStrategy {
  readonly algorithm: RateLimitAlgorithm;

  /** Decide on one request for `key` and update its state */
  check(key: string, config: RateLimitConfig): RateLimitResult;

  /** Drop all state for a key */
  reset(key: string): void;

  /** Evict keys whose state can no longer affect a decision; returns the count removed */
  sweep(idleTtlSeconds: number): number;

  /** Number of keys currently tracked */
  size(): number;
}

// =============================================================================
// Headers and Error Bodies
// =============================================================================

/**
 * Standard rate limit response headers
 */
export interface RateLimitHeaders {
  'X-RateLimit-Limit': string;
  'X-RateLimit-Remaining': string;
  'X-RateLimit-Reset': string;
  'Retry-After'?: string;
}

/**
 * Body of a 429 response
 */
export interface RateLimitErrorBody {
  error: 'Rate limit exceeded';
  retry_after: number | null;
  message: string;
}

// =============================================================================
// Statistics
// =============================================================================

export interface RateLimiterStats {
  totalRequests: number;
  allowedRequests: number;
  deniedRequests: number;
  /** denied / total, 0 before any request */
  denialRate: number;
  /** Up to ten keys with the most denials, highest first */
  topDenied: Array<{ key: string; denied: number }>;
  /** Keys tracked per strategy */
  trackedKeys: Record<string, number>;
}
