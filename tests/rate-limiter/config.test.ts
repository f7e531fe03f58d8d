/**
 * Agent Gateway - Rate Limit Configuration Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  DEFAULT_EXEMPT_PATHS,
  createRateLimitConfig,
  findEndpointOverride,
  isExemptPath,
  resolveEndpointConfig,
} from '../../src/rate-limiter/config.js';
import { ConfigurationError } from '../../src/utils/types.js';

describe('createRateLimitConfig', () => {
  it('should fill in defaults', () => {
    const config = createRateLimitConfig();

    expect(config).toEqual({
      requestsPerSecond: 10,
      requestsPerMinute: 100,
      requestsPerHour: 1000,
      burstSize: 20,
      enabled: true,
      endpointOverrides: [],
      exemptPaths: [...DEFAULT_EXEMPT_PATHS],
    });
  });

  it('should return a frozen config', () => {
    const config = createRateLimitConfig({ burstSize: 5 });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.exemptPaths)).toBe(true);
  });

  it('should reject non-positive limits', () => {
    expect(() => createRateLimitConfig({ requestsPerSecond: 0 })).toThrow(ConfigurationError);
    expect(() => createRateLimitConfig({ burstSize: -1 })).toThrow(
      'Rate limit burstSize must be at least 1, got -1'
    );
  });

  it('should reject counts below one but allow a fractional refill rate', () => {
    expect(() => createRateLimitConfig({ burstSize: 0.5 })).toThrow(
      'Rate limit burstSize must be at least 1, got 0.5'
    );
    expect(() => createRateLimitConfig({ requestsPerHour: 0.9 })).toThrow(ConfigurationError);
    expect(() =>
      createRateLimitConfig({ endpointOverrides: [{ prefix: '/completion', requestsPerMinute: 0.5 }] })
    ).toThrow("Rate limit requestsPerMinute for '/completion' must be at least 1, got 0.5");
    expect(createRateLimitConfig({ requestsPerSecond: 0.5 }).requestsPerSecond).toBe(0.5);
  });

  it('should reject overrides with a relative prefix or a bad limit', () => {
    expect(() => createRateLimitConfig({ endpointOverrides: [{ prefix: 'api' }] })).toThrow(
      "Endpoint override prefix must start with '/', got 'api'"
    );
    expect(() =>
      createRateLimitConfig({ endpointOverrides: [{ prefix: '/api', requestsPerMinute: 0 }] })
    ).toThrow(ConfigurationError);
  });
});

describe('endpoint overrides', () => {
  const config = createRateLimitConfig({
    requestsPerMinute: 100,
    burstSize: 20,
    endpointOverrides: [
      { prefix: '/completion', requestsPerMinute: 10 },
      { prefix: '/comp', burstSize: 1 },
    ],
  });

  it('should use the first matching prefix', () => {
    expect(findEndpointOverride(config, '/completion/stream')?.prefix).toBe('/completion');
    expect(findEndpointOverride(config, '/compare')?.prefix).toBe('/comp');
    expect(findEndpointOverride(config, '/agents')).toBeUndefined();
  });

  it('should layer only the fields the override sets', () => {
    const resolved = resolveEndpointConfig(config, '/completion');

    expect(resolved.requestsPerMinute).toBe(10);
    expect(resolved.burstSize).toBe(20);
    expect(resolved.requestsPerHour).toBe(config.requestsPerHour);
  });

  it('should return the base config when nothing matches', () => {
    expect(resolveEndpointConfig(config, '/agents')).toBe(config);
  });
});

describe('isExemptPath', () => {
  const config = createRateLimitConfig({ exemptPaths: ['/metrics'] });

  it('should match exact paths only', () => {
    expect(isExemptPath(config, '/metrics')).toBe(true);
    expect(isExemptPath(config, '/metrics/extra')).toBe(false);
    expect(isExemptPath(config, '/completion')).toBe(false);
  });
});
