/**
 * Agent Gateway - Gateway Server
 * Express application exposing completions, agent listing, health and metrics
 */

import http from 'http';
import { type AddressInfo } from 'net';

import compression from 'compression';
import cors from 'cors';
import express, { type Application, type Request, type RequestHandler, type Response } from 'express';
import helmet from 'helmet';

import { loadConfig } from '../config/loader.js';
import { formatValidationErrors, type GatewayConfig, type RateLimitSettings } from '../config/schema.js';
import { HealthMonitor, createDefaultProbes } from '../health/index.js';
import { MetricsService, createMetricsMiddleware } from '../monitoring/index.js';
import { CompletionRequestSchema, createProviders, type FetchLike } from '../providers/index.js';
import {
  RateLimiter,
  createRateLimitConfig,
  createRateLimitMiddleware,
} from '../rate-limiter/index.js';
import { RetryPolicy } from '../retry/index.js';
import logger, { logLifecycle } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { NotFoundError, ValidationError } from '../utils/types.js';

import { AgentGateway } from './agent-gateway.js';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';

// =============================================================================
// Types
// =============================================================================

export const SERVICE_NAME = 'Agent Gateway';
export const SERVICE_VERSION = '1.0.0';

/** Dependencies that must be up before the gateway takes traffic */
export const READINESS_SERVICES = ['postgres', 'redis'] as const;

export const POLICY_NAMES = ['completion', 'agents', 'health'] as const;
export type PolicyName = (typeof POLICY_NAMES)[number];

export type PolicyLimiters = Record<PolicyName, RateLimiter>;

export interface GatewayComponents {
  gateway: AgentGateway;
  healthMonitor: HealthMonitor;
  metrics: MetricsService;
  limiters: PolicyLimiters;
}

export interface GatewayServerOptions {
  config?: GatewayConfig;
  configPath?: string;
  /** Replaces the components built from config, e.g. with fakes in tests */
  components?: Partial<GatewayComponents>;
  /** HTTP client handed to providers and HTTP probes */
  fetchImpl?: FetchLike;
}

// =============================================================================
// Policy Limiters
// =============================================================================

/**
 * Per-minute limit for each route group. Agent listing gets a quarter of the
 * completion budget with a floor of 30; health checks get a flat 60.
 */
export function policyRequestsPerMinute(policy: PolicyName, requestsPerMinute: number): number {
  switch (policy) {
    case 'completion':
      return requestsPerMinute;
    case 'agents':
      return Math.max(30, Math.floor(requestsPerMinute / 4));
    case 'health':
      return 60;
  }
}

export function createPolicyLimiters(settings: RateLimitSettings, clock?: () => number): PolicyLimiters {
  const build = (policy: PolicyName): RateLimiter => {
    const config = createRateLimitConfig({
      enabled: settings.enabled,
      requestsPerSecond: settings.requestsPerSecond,
      requestsPerMinute: policyRequestsPerMinute(policy, settings.requestsPerMinute),
      requestsPerHour: settings.requestsPerHour,
      burstSize: settings.burstSize,
      endpointOverrides: settings.endpointOverrides,
      exemptPaths: settings.exemptPaths,
    });

    return new RateLimiter(config, {
      hourStrategy: settings.hourStrategy,
      keyIdleTtlSeconds: settings.keyIdleTtlSeconds,
      ...(clock ? { clock } : {}),
    });
  };

  return {
    completion: build('completion'),
    agents: build('agents'),
    health: build('health'),
  };
}

// =============================================================================
// Gateway Server Class
// =============================================================================

export class GatewayServer {
  private readonly app: Application;
  private readonly options: GatewayServerOptions;
  private server: http.Server | null = null;
  private config: GatewayConfig | null = null;
  private components: GatewayComponents | null = null;
  private isShuttingDown = false;
  private readonly startedAt = Date.now();

  constructor(options: GatewayServerOptions = {}) {
    this.app = express();
    this.options = options;
    if (options.config) {
      this.config = options.config;
    }
  }

  /**
   * Build components, middleware and routes. Safe to call once.
   */
  public initialize(): void {
    if (this.components !== null) {
      return;
    }

    const config = this.config ?? loadConfig(this.options.configPath);
    this.config = config;
    this.components = this.buildComponents(config);

    this.setupMiddleware(config, this.components);
    this.setupRoutes(config, this.components);

    for (const limiter of Object.values(this.components.limiters)) {
      limiter.startSweeper(config.rateLimit.sweepIntervalMs);
    }

    logLifecycle('startup', 'Gateway server initialized', {
      agents: Object.entries(this.components.gateway.listAgents())
        .filter(([, info]) => info.available)
        .map(([name]) => name),
      services: this.components.healthMonitor.getServiceNames(),
      rateLimitingEnabled: config.rateLimit.enabled,
      metricsEnabled: config.metrics.enabled,
    });
  }

  private buildComponents(config: GatewayConfig): GatewayComponents {
    const injected = this.options.components ?? {};
    const fetchImpl = this.options.fetchImpl;

    const metrics =
      injected.metrics ??
      new MetricsService({ collectDefaultMetrics: config.metrics.collectDefaultMetrics });

    const gateway =
      injected.gateway ??
      new AgentGateway({
        providers: createProviders(config.providers, fetchImpl),
        retryPolicy: new RetryPolicy({
          maxAttempts: config.retry.maxAttempts,
          minWaitMs: config.retry.minWaitMs,
          maxWaitMs: config.retry.maxWaitMs,
          ...(config.retry.deadlineMs !== undefined ? { deadlineMs: config.retry.deadlineMs } : {}),
        }),
        metrics,
      });

    const healthMonitor =
      injected.healthMonitor ??
      new HealthMonitor(createDefaultProbes(config.health, fetchImpl ? { fetchImpl } : {}), {
        defaultTimeoutMs: config.health.timeoutMs,
      });

    const limiters = injected.limiters ?? createPolicyLimiters(config.rateLimit);

    return { gateway, healthMonitor, metrics, limiters };
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(config: GatewayConfig, components: GatewayComponents): void {
    this.app.set('trust proxy', config.server.trustProxy);

    this.app.use(
      helmet({
        contentSecurityPolicy: false,
      })
    );
    this.app.use(cors());
    this.app.use(compression());
    this.app.use(requestIdMiddleware());

    if (config.metrics.enabled) {
      this.app.use(createMetricsMiddleware(components.metrics));
    }

    this.app.use(requestLogger());
    this.app.use(express.json({ limit: '1mb' }));
  }

  private policy(name: PolicyName, config: GatewayConfig, components: GatewayComponents): RequestHandler {
    return createRateLimitMiddleware({
      limiter: components.limiters[name],
      policy: name,
      onDecision: (policy, result) => {
        if (config.metrics.enabled) {
          components.metrics.recordRateLimitDecision(policy, result);
        }
      },
    });
  }

  /**
   * Set up Express routes
   */
  private setupRoutes(config: GatewayConfig, components: GatewayComponents): void {
    const { gateway, healthMonitor, metrics, limiters } = components;
    const healthPolicy = this.policy('health', config, components);

    this.app.get('/', (_req: Request, res: Response) => {
      res.status(200).json({ service: SERVICE_NAME, version: SERVICE_VERSION, status: 'running' });
    });

    this.app.get('/agents', this.policy('agents', config, components), (_req: Request, res: Response) => {
      res.status(200).json(gateway.listAgents());
    });

    this.app.post(
      '/completion',
      this.policy('completion', config, components),
      asyncHandler(async (req: Request, res: Response) => {
        const parsed = CompletionRequestSchema.safeParse(req.body);
        if (!parsed.success) {
          throw new ValidationError('Invalid completion request', formatValidationErrors(parsed.error));
        }

        const response = await gateway.completion(parsed.data);
        res.status(200).json(response);
      })
    );

    const healthSummary = asyncHandler(async (_req: Request, res: Response) => {
      const summary = await healthMonitor.summary();
      res.status(summary.status === 'healthy' ? 200 : 503).json(summary);
    });
    this.app.get('/health', healthPolicy, healthSummary);
    this.app.get('/healthz', healthPolicy, healthSummary);

    // Orchestrator probes; exempt from rate limiting by default
    this.app.get('/health/live', healthPolicy, (_req: Request, res: Response) => {
      res.status(200).json({
        status: 'alive',
        uptime_seconds: Math.round((Date.now() - this.startedAt) / 10) / 100,
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get(
      '/health/ready',
      healthPolicy,
      asyncHandler(async (_req: Request, res: Response) => {
        const results = await Promise.all(READINESS_SERVICES.map((name) => healthMonitor.serviceStatus(name)));

        const checks: Record<string, 'healthy' | 'unhealthy'> = {};
        for (const result of results) {
          // Services without a registered probe do not gate readiness
          if (result !== null) {
            checks[result.service] = result.ok ? 'healthy' : 'unhealthy';
          }
        }

        const ready = Object.values(checks).every((check) => check === 'healthy');
        res.status(ready ? 200 : 503).json({
          status: ready ? 'ready' : 'not_ready',
          timestamp: new Date().toISOString(),
          checks,
        });
      })
    );

    this.app.get(
      '/healthz/:service',
      healthPolicy,
      asyncHandler(async (req: Request, res: Response) => {
        const name = req.params['service'] ?? '';
        const result = await healthMonitor.serviceStatus(name);
        if (result === null) {
          throw new NotFoundError(`Unknown service '${name}'`);
        }
        res.status(result.ok ? 200 : 503).json(result);
      })
    );

    this.app.get(
      '/metrics',
      asyncHandler(async (_req: Request, res: Response) => {
        if (!config.metrics.enabled) {
          throw new NotFoundError('Metrics are disabled');
        }
        res.setHeader('Content-Type', metrics.contentType);
        res.status(200).send(await metrics.getMetricsText());
      })
    );

    this.app.get('/_gateway/ratelimit', (_req: Request, res: Response) => {
      const policies: Record<string, unknown> = {};
      for (const name of POLICY_NAMES) {
        const limiter = limiters[name];
        const { requestsPerSecond, requestsPerMinute, requestsPerHour, burstSize } = limiter.getConfig();
        policies[name] = {
          limits: { requestsPerSecond, requestsPerMinute, requestsPerHour, burstSize },
          stats: limiter.getStats(),
        };
      }
      res.status(200).json({ enabled: config.rateLimit.enabled, policies });
    });

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  /**
   * Start the gateway server
   */
  public async start(): Promise<void> {
    this.initialize();

    const config = this.getConfig();
    const { port, host } = config.server;

    await new Promise<void>((resolve, reject) => {
      const server = http.createServer(this.app);
      this.server = server;

      server.once('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });

      server.listen(port, host, () => {
        const address = server.address();
        const bound: AddressInfo | null = typeof address === 'object' ? address : null;

        logLifecycle('ready', `Agent Gateway listening on ${bound?.address ?? host}:${bound?.port ?? port}`, {
          environment: config.server.nodeEnv,
          rateLimiting: config.rateLimit.enabled,
          metricsEnabled: config.metrics.enabled,
        });

        resolve();
      });
    });

    this.setupGracefulShutdown();
  }

  /**
   * Set up graceful shutdown handlers
   */
  private setupGracefulShutdown(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    for (const signal of signals) {
      process.once(signal, () => {
        this.shutdown(signal)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logLifecycle('error', 'Error during shutdown', { error: errorMessage(error) });
            process.exit(1);
          });
      });
    }
  }

  /**
   * Gracefully shutdown the server
   */
  public async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    logLifecycle('shutdown', `Shutting down gateway${signal ? ` (${signal})` : ''}...`);

    if (this.components !== null) {
      for (const limiter of Object.values(this.components.limiters)) {
        limiter.stopSweeper();
      }
      await this.components.healthMonitor.close();
    }

    const server = this.server;
    if (server !== null) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
      this.server = null;
    }

    logger.info('Gateway shutdown complete');
  }

  /**
   * Get the Express application (for testing)
   */
  public getApp(): Application {
    return this.app;
  }

  public getConfig(): GatewayConfig {
    if (this.config === null) {
      throw new Error('Gateway server is not initialized');
    }
    return this.config;
  }

  public getComponents(): GatewayComponents {
    if (this.components === null) {
      throw new Error('Gateway server is not initialized');
    }
    return this.components;
  }
}

export function createGatewayServer(options?: GatewayServerOptions): GatewayServer {
  return new GatewayServer(options);
}

export default GatewayServer;
