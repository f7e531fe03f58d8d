/**
 * Agent Gateway - Configuration Schema
 * Zod-based validation schemas for gateway configuration
 */

import { z } from 'zod';

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  /** Express `trust proxy`: take the client IP from X-Forwarded-For. Only enable behind a proxy that sets it. */
  trustProxy: z.boolean().default(false),
});

// =============================================================================
// Rate Limiting Configuration Schema
// =============================================================================

export const EndpointOverrideSchema = z.object({
  prefix: z.string().startsWith('/'),
  requestsPerSecond: z.number().positive().optional(),
  requestsPerMinute: z.number().int().min(1).optional(),
  requestsPerHour: z.number().int().min(1).optional(),
  burstSize: z.number().int().min(1).optional(),
});

export const RateLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  requestsPerSecond: z.number().positive().default(10),
  /** Limit for the completion policy; the agents policy derives from it */
  requestsPerMinute: z.number().int().min(1).default(120),
  requestsPerHour: z.number().int().min(1).default(1000),
  burstSize: z.number().int().min(1).default(20),
  hourStrategy: z.enum(['fixed-window', 'sliding-window']).default('fixed-window'),
  keyIdleTtlSeconds: z.number().int().min(1).default(3600),
  sweepIntervalMs: z.number().int().min(1000).default(60000),
  endpointOverrides: z.array(EndpointOverrideSchema).default([]),
  exemptPaths: z.array(z.string()).default(['/health/live', '/health/ready', '/metrics']),
});

// =============================================================================
// Retry Configuration Schema
// =============================================================================

export const RetryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    minWaitMs: z.number().int().min(0).default(2000),
    maxWaitMs: z.number().int().min(0).default(10000),
    deadlineMs: z.number().int().min(1).optional(),
  })
  .refine((retry) => retry.maxWaitMs >= retry.minWaitMs, {
    message: 'maxWaitMs must be greater than or equal to minWaitMs',
    path: ['maxWaitMs'],
  });

// =============================================================================
// Provider Configuration Schema
// =============================================================================

export const OpenAIProviderSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  model: z.string().default('gpt-4'),
  models: z.array(z.string()).default(['gpt-4', 'gpt-3.5-turbo', 'gpt-4-turbo-preview']),
});

export const ClaudeProviderSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().default('https://api.anthropic.com/v1'),
  model: z.string().default('claude-3-opus-20240229'),
  models: z.array(z.string()).default(['claude-3-opus-20240229', 'claude-3-sonnet-20240229']),
});

export const LMStudioProviderSchema = z.object({
  baseUrl: z.string().url().default('http://host.docker.internal:1234/v1'),
  model: z.string().default('local-model'),
  models: z.array(z.string()).default(['local-model']),
});

export const OllamaProviderSchema = z.object({
  baseUrl: z.string().url().default('http://ollama:11434'),
  model: z.string().default('llama2'),
  models: z.array(z.string()).default(['llama2', 'mistral', 'codellama']),
});

export const ProvidersConfigSchema = z.object({
  /** Per-attempt timeout for upstream calls */
  timeoutMs: z.number().int().min(100).default(120000),
  openai: OpenAIProviderSchema.default({}),
  claude: ClaudeProviderSchema.default({}),
  lmstudio: LMStudioProviderSchema.default({}),
  ollama: OllamaProviderSchema.default({}),
});

// =============================================================================
// Health Check Configuration Schema
// =============================================================================

export const PostgresConfigSchema = z.object({
  host: z.string().default('postgres'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('postgres'),
  user: z.string().default('postgres'),
  password: z.string().default('postgres'),
  ssl: z.boolean().default(false),
  timeoutMs: z.number().int().min(100).default(5000),
});

export const RedisConfigSchema = z.object({
  host: z.string().default('redis'),
  port: z.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).max(15).default(0),
  tls: z.boolean().default(false),
});

export const HealthConfigSchema = z.object({
  /** Per-probe timeout */
  timeoutMs: z.number().int().min(100).default(5000),
  postgres: PostgresConfigSchema.default({}),
  redis: RedisConfigSchema.default({}),
  qdrantUrl: z.string().default('http://qdrant:6333'),
  /** Blank disables the probe, which then reports healthy */
  langflowUrl: z.string().default('http://langflow:7860'),
  n8nUrl: z.string().default('http://n8n:5678'),
});

// =============================================================================
// Metrics Configuration Schema
// =============================================================================

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Also export prom-client's process and runtime metrics */
  collectDefaultMetrics: z.boolean().default(false),
});

// =============================================================================
// Main Configuration Schema (YAML/JSON file)
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
});

// =============================================================================
// Exported Types from Schemas
// =============================================================================

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type GatewayConfig = z.output<typeof ConfigFileSchema>;

export type ServerConfig = GatewayConfig['server'];
export type RateLimitSettings = GatewayConfig['rateLimit'];
export type RetrySettings = GatewayConfig['retry'];
export type ProvidersConfig = GatewayConfig['providers'];
export type HealthConfig = GatewayConfig['health'];
export type PostgresConfig = HealthConfig['postgres'];
export type RedisConfig = HealthConfig['redis'];
export type MetricsConfig = GatewayConfig['metrics'];

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Validate configuration, filling in defaults
 */
export function validateConfigFile(config: unknown): GatewayConfig {
  return ConfigFileSchema.parse(config);
}

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, GatewayConfig> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
