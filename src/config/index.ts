/**
 * Agent Gateway - Configuration Module
 *
 * Barrel export file for configuration management
 */

export {
  ConfigFileSchema,
  ServerConfigSchema,
  RateLimitConfigSchema,
  EndpointOverrideSchema,
  RetryConfigSchema,
  ProvidersConfigSchema,
  HealthConfigSchema,
  MetricsConfigSchema,
  validateConfigFile,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type {
  ConfigFileInput,
  GatewayConfig,
  ServerConfig,
  RateLimitSettings,
  RetrySettings,
  ProvidersConfig,
  HealthConfig,
  PostgresConfig,
  RedisConfig,
  MetricsConfig,
} from './schema.js';

export { ConfigLoader, loadConfig } from './loader.js';
