/**
 * Agent Gateway - Prometheus Metrics
 * prom-client registry with the gateway's request, completion and rate limit series
 */

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { RateLimitCheckResult } from '../rate-limiter/limiter.js';

export type CompletionOutcome = 'success' | 'error';

export interface MetricsServiceOptions {
  /** Also export process and runtime metrics */
  collectDefaultMetrics?: boolean;
}

export class MetricsService {
  readonly registry: Registry;
  readonly httpRequestsTotal: Counter<'method' | 'route' | 'status_code'>;
  readonly completionDuration: Histogram<'agent' | 'outcome'>;
  readonly rateLimitDecisionsTotal: Counter<'policy' | 'decision'>;
  readonly upstreamRetriesTotal: Counter<'agent'>;

  constructor(options: MetricsServiceOptions = {}) {
    this.registry = new Registry();
    if (options.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry, prefix: 'gateway_' });
    }

    this.httpRequestsTotal = new Counter({
      name: 'gateway_http_requests_total',
      help: 'Total HTTP requests handled by the gateway',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry],
    });

    this.completionDuration = new Histogram({
      name: 'gateway_completion_duration_seconds',
      help: 'Completion latency including retries, in seconds',
      labelNames: ['agent', 'outcome'],
      buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120],
      registers: [this.registry],
    });

    this.rateLimitDecisionsTotal = new Counter({
      name: 'gateway_rate_limit_decisions_total',
      help: 'Rate limit decisions per policy',
      labelNames: ['policy', 'decision'],
      registers: [this.registry],
    });

    this.upstreamRetriesTotal = new Counter({
      name: 'gateway_upstream_retries_total',
      help: 'Upstream calls retried after a transient failure',
      labelNames: ['agent'],
      registers: [this.registry],
    });
  }

  recordHttpRequest(method: string, route: string, statusCode: number): void {
    this.httpRequestsTotal.inc({ method, route, status_code: String(statusCode) });
  }

  observeCompletion(agent: string, outcome: CompletionOutcome, seconds: number): void {
    this.completionDuration.observe({ agent, outcome }, seconds);
  }

  recordRateLimitDecision(policy: string, result: RateLimitCheckResult): void {
    this.rateLimitDecisionsTotal.inc({ policy, decision: result.allowed ? 'allowed' : 'denied' });
  }

  recordRetry(agent: string): void {
    this.upstreamRetriesTotal.inc({ agent });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async getMetricsText(): Promise<string> {
    return this.registry.metrics();
  }
}

export function createMetricsService(options?: MetricsServiceOptions): MetricsService {
  return new MetricsService(options);
}

export default MetricsService;
