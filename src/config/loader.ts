/**
 * Agent Gateway - Configuration Loader
 * Reads the optional config file, layers environment variables on top and validates
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import logger, { logConfig } from '../utils/logger.js';
import {
  errorMessage,
  getEnvBool,
  getEnvFloat,
  getEnvInt,
  getEnvString,
} from '../utils/helpers.js';
import { ConfigurationError } from '../utils/types.js';

import {
  ServerConfigSchema,
  formatValidationErrors,
  safeValidateConfigFile,
  type ConfigFileInput,
  type GatewayConfig,
} from './schema.js';

const DEFAULT_CONFIG_PATH = './config/gateway.config.yaml';

type NodeEnv = GatewayConfig['server']['nodeEnv'];

function parseNodeEnv(value: string | undefined): NodeEnv | undefined {
  const parsed = ServerConfigSchema.shape.nodeEnv.safeParse(value);
  return value !== undefined && parsed.success ? parsed.data : undefined;
}

/**
 * Seconds in the environment (POSTGRES_HEALTH_TIMEOUT, SERVICE_HEALTH_TIMEOUT) to ms
 */
function getEnvSecondsAsMs(key: string): number | undefined {
  const seconds = getEnvFloat(key);
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private readonly configPath: string;
  private currentConfig: GatewayConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath ?? getEnvString('CONFIG_FILE_PATH') ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables.
   * Throws ConfigurationError when the merged result fails validation.
   */
  public load(): GatewayConfig {
    const fileConfig = this.validate(this.readFile(), this.configPath);
    const config = this.validate(this.applyEnvironment(fileConfig), 'environment');

    logConfig('Configuration loaded', {
      path: this.configPath,
      port: config.server.port,
      rateLimitEnabled: config.rateLimit.enabled,
      requestsPerMinute: config.rateLimit.requestsPerMinute,
      metricsEnabled: config.metrics.enabled,
    });

    this.currentConfig = config;
    return config;
  }

  /**
   * Get current configuration
   */
  public getConfig(): GatewayConfig {
    if (this.currentConfig === null) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private readFile(): unknown {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    try {
      const fileContent = fs.readFileSync(this.configPath, 'utf-8');
      const extension = path.extname(this.configPath).toLowerCase();

      if (extension === '.yaml' || extension === '.yml') {
        const parsed: unknown = parseYaml(fileContent);
        return parsed ?? {};
      }
      if (extension === '.json') {
        const parsed: unknown = JSON.parse(fileContent);
        return parsed;
      }
      throw new Error(`Unsupported config file format: ${extension}`);
    } catch (error) {
      logger.warn('Failed to load config file, using defaults', {
        path: this.configPath,
        error: errorMessage(error),
      });
      return {};
    }
  }

  private validate(input: unknown, source: string): GatewayConfig {
    const result = safeValidateConfigFile(input);
    if (!result.success) {
      const errors = formatValidationErrors(result.error);
      throw new ConfigurationError(`Invalid configuration (${source}): ${errors.join('; ')}`);
    }
    return result.data;
  }

  /**
   * Environment variables win over file values
   */
  private applyEnvironment(file: GatewayConfig): ConfigFileInput {
    const { server, rateLimit, retry, providers, health, metrics } = file;

    const langflowUrl = process.env['LANGFLOW_INTERNAL_URL'] ?? process.env['LANGFLOW_HOST'];
    const n8nHost = getEnvString('N8N_HOST');
    const n8nUrl =
      process.env['N8N_INTERNAL_URL'] ??
      (n8nHost ? `http://${n8nHost}:${getEnvString('N8N_PORT') ?? '5678'}` : undefined);

    return {
      server: {
        port: getEnvInt('PORT') ?? server.port,
        host: getEnvString('HOST') ?? server.host,
        nodeEnv: parseNodeEnv(getEnvString('NODE_ENV')) ?? server.nodeEnv,
        trustProxy: getEnvBool('TRUST_PROXY') ?? server.trustProxy,
      },

      rateLimit: {
        ...rateLimit,
        enabled: getEnvBool('RATE_LIMIT_ENABLED') ?? rateLimit.enabled,
        requestsPerSecond: getEnvFloat('RATE_LIMIT_PER_SECOND') ?? rateLimit.requestsPerSecond,
        requestsPerMinute: getEnvInt('RATE_LIMIT_PER_MINUTE') ?? rateLimit.requestsPerMinute,
        requestsPerHour: getEnvInt('RATE_LIMIT_PER_HOUR') ?? rateLimit.requestsPerHour,
        burstSize: getEnvInt('RATE_LIMIT_BURST') ?? rateLimit.burstSize,
      },

      retry: {
        maxAttempts: getEnvInt('LLM_RETRY_MAX_ATTEMPTS') ?? retry.maxAttempts,
        minWaitMs: getEnvInt('LLM_RETRY_MIN_WAIT_MS') ?? retry.minWaitMs,
        maxWaitMs: getEnvInt('LLM_RETRY_MAX_WAIT_MS') ?? retry.maxWaitMs,
        deadlineMs: getEnvInt('LLM_RETRY_DEADLINE_MS') ?? retry.deadlineMs,
      },

      providers: {
        timeoutMs: getEnvInt('UPSTREAM_TIMEOUT_MS') ?? providers.timeoutMs,
        openai: {
          ...providers.openai,
          apiKey: getEnvString('OPENAI_API_KEY') ?? providers.openai.apiKey,
          baseUrl: getEnvString('OPENAI_BASE_URL') ?? providers.openai.baseUrl,
          model: getEnvString('OPENAI_MODEL') ?? providers.openai.model,
        },
        claude: {
          ...providers.claude,
          apiKey: getEnvString('ANTHROPIC_API_KEY') ?? providers.claude.apiKey,
          baseUrl: getEnvString('ANTHROPIC_BASE_URL') ?? providers.claude.baseUrl,
          model: getEnvString('ANTHROPIC_MODEL') ?? providers.claude.model,
        },
        lmstudio: {
          ...providers.lmstudio,
          baseUrl: getEnvString('LM_STUDIO_URL') ?? providers.lmstudio.baseUrl,
          model: getEnvString('LM_STUDIO_MODEL') ?? providers.lmstudio.model,
        },
        ollama: {
          ...providers.ollama,
          baseUrl: getEnvString('OLLAMA_URL') ?? providers.ollama.baseUrl,
          model: getEnvString('OLLAMA_MODEL') ?? providers.ollama.model,
        },
      },

      health: {
        timeoutMs: getEnvSecondsAsMs('SERVICE_HEALTH_TIMEOUT') ?? health.timeoutMs,
        postgres: {
          host: getEnvString('POSTGRES_HOST') ?? health.postgres.host,
          port: getEnvInt('POSTGRES_PORT') ?? health.postgres.port,
          database: getEnvString('POSTGRES_DB') ?? health.postgres.database,
          user: getEnvString('POSTGRES_USER') ?? health.postgres.user,
          password: getEnvString('POSTGRES_PASSWORD') ?? health.postgres.password,
          ssl: getEnvBool('POSTGRES_SSL') ?? health.postgres.ssl,
          timeoutMs: getEnvSecondsAsMs('POSTGRES_HEALTH_TIMEOUT') ?? health.postgres.timeoutMs,
        },
        redis: {
          host: getEnvString('REDIS_HOST') ?? health.redis.host,
          port: getEnvInt('REDIS_PORT') ?? health.redis.port,
          password: getEnvString('REDIS_PASSWORD') ?? health.redis.password,
          db: getEnvInt('REDIS_DB') ?? health.redis.db,
          tls: getEnvBool('REDIS_TLS') ?? health.redis.tls,
        },
        qdrantUrl: getEnvString('QDRANT_HOST') ?? health.qdrantUrl,
        // An explicitly empty variable disables the probe
        langflowUrl: langflowUrl ?? health.langflowUrl,
        n8nUrl: n8nUrl ?? health.n8nUrl,
      },

      metrics: {
        enabled: getEnvBool('PROMETHEUS_METRICS_ENABLED') ?? metrics.enabled,
        collectDefaultMetrics:
          getEnvBool('PROMETHEUS_DEFAULT_METRICS') ?? metrics.collectDefaultMetrics,
      },
    };
  }
}

/**
 * Load configuration once, for the entry point
 */
export function loadConfig(configPath?: string): GatewayConfig {
  return new ConfigLoader(configPath).load();
}

export default ConfigLoader;
