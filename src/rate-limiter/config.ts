/**
 * Agent Gateway - Rate Limit Configuration
 * Construction, validation and per-endpoint derivation of rate limit policies
 */

import { ConfigurationError } from '../utils/types.js';
import type { EndpointOverride, RateLimitConfig } from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_EXEMPT_PATHS: readonly string[] = ['/health/live', '/health/ready', '/metrics'];

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = Object.freeze({
  requestsPerSecond: 10,
  requestsPerMinute: 100,
  requestsPerHour: 1000,
  burstSize: 20,
  enabled: true,
  endpointOverrides: Object.freeze([]),
  exemptPaths: Object.freeze([...DEFAULT_EXEMPT_PATHS]),
});

export type RateLimitConfigInput = Partial<{
  -readonly [K in keyof RateLimitConfig]: RateLimitConfig[K];
}>;

// =============================================================================
// Validation
// =============================================================================

type LimitField = 'requestsPerSecond' | 'requestsPerMinute' | 'requestsPerHour' | 'burstSize';

const LIMIT_FIELDS: readonly LimitField[] = ['requestsPerSecond', 'requestsPerMinute', 'requestsPerHour', 'burstSize'];

/**
 * The refill rate may be fractional. Counts and bucket sizes below 1 would
 * deny every request.
 */
function assertLimit(field: LimitField, value: number, label: string = field): void {
  if (field === 'requestsPerSecond') {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`Rate limit ${label} must be a positive number, got ${value}`);
    }
    return;
  }
  if (!Number.isFinite(value) || value < 1) {
    throw new ConfigurationError(`Rate limit ${label} must be at least 1, got ${value}`);
  }
}

function validateLimits(config: Record<LimitField, number>): void {
  for (const field of LIMIT_FIELDS) {
    assertLimit(field, config[field]);
  }
}

function freezeOverride(override: EndpointOverride): EndpointOverride {
  if (!override.prefix.startsWith('/')) {
    throw new ConfigurationError(`Endpoint override prefix must start with '/', got '${override.prefix}'`);
  }
  for (const field of LIMIT_FIELDS) {
    const value = override[field];
    if (value !== undefined) {
      assertLimit(field, value, `${field} for '${override.prefix}'`);
    }
  }
  return Object.freeze({ ...override });
}

/**
 * Build a frozen config from partial input, falling back to the defaults.
 * Throws ConfigurationError for limits that could never admit a request.
 */
export function createRateLimitConfig(input: RateLimitConfigInput = {}): RateLimitConfig {
  const merged = {
    requestsPerSecond: input.requestsPerSecond ?? DEFAULT_RATE_LIMIT_CONFIG.requestsPerSecond,
    requestsPerMinute: input.requestsPerMinute ?? DEFAULT_RATE_LIMIT_CONFIG.requestsPerMinute,
    requestsPerHour: input.requestsPerHour ?? DEFAULT_RATE_LIMIT_CONFIG.requestsPerHour,
    burstSize: input.burstSize ?? DEFAULT_RATE_LIMIT_CONFIG.burstSize,
    enabled: input.enabled ?? DEFAULT_RATE_LIMIT_CONFIG.enabled,
  };
  validateLimits(merged);

  return Object.freeze({
    ...merged,
    endpointOverrides: Object.freeze((input.endpointOverrides ?? []).map(freezeOverride)),
    exemptPaths: Object.freeze([...(input.exemptPaths ?? DEFAULT_EXEMPT_PATHS)]),
  });
}

// =============================================================================
// Endpoint Resolution
// =============================================================================

/**
 * First override whose prefix the path starts with, if any
 */
export function findEndpointOverride(
  config: RateLimitConfig,
  path: string
): EndpointOverride | undefined {
  return config.endpointOverrides.find((override) => path.startsWith(override.prefix));
}

/**
 * Effective config for a path: the base config with the first matching
 * override's fields layered on top. Returns the base config unchanged when
 * nothing matches.
 */
export function resolveEndpointConfig(config: RateLimitConfig, path: string): RateLimitConfig {
  const override = findEndpointOverride(config, path);
  if (!override) {
    return config;
  }

  const derived = {
    requestsPerSecond: override.requestsPerSecond ?? config.requestsPerSecond,
    requestsPerMinute: override.requestsPerMinute ?? config.requestsPerMinute,
    requestsPerHour: override.requestsPerHour ?? config.requestsPerHour,
    burstSize: override.burstSize ?? config.burstSize,
  };

  return Object.freeze({
    ...derived,
    enabled: config.enabled,
    endpointOverrides: config.endpointOverrides,
    exemptPaths: config.exemptPaths,
  });
}

export function isExemptPath(config: RateLimitConfig, path: string): boolean {
  return config.exemptPaths.includes(path);
}
