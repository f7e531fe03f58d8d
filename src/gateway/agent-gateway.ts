/**
 * Agent Gateway - Completion Routing
 * Resolves the requested agent and runs its completion under the retry policy
 */

import { logUpstream } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import { ProviderNotConfiguredError, UnknownProviderError, UpstreamHttpError } from '../utils/types.js';
import type { RetryPolicy } from '../retry/policy.js';
import type { MetricsService } from '../monitoring/metrics.js';
import type {
  AgentInfo,
  CompletionRequest,
  CompletionResponse,
  LLMProvider,
} from '../providers/types.js';

export interface AgentGatewayOptions {
  providers: LLMProvider[];
  retryPolicy: RetryPolicy;
  metrics?: MetricsService;
  clock?: () => number;
}

export class AgentGateway {
  private readonly providers = new Map<string, LLMProvider>();
  private readonly retryPolicy: RetryPolicy;
  private readonly metrics: MetricsService | undefined;
  private readonly clock: () => number;

  constructor(options: AgentGatewayOptions) {
    for (const provider of options.providers) {
      this.providers.set(provider.name, provider);
    }
    this.retryPolicy = options.retryPolicy;
    this.metrics = options.metrics;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Unknown and unconfigured agents fail before any upstream I/O.
   */
  public async completion(request: CompletionRequest): Promise<CompletionResponse> {
    const agent = request.agent.trim().toLowerCase();
    const provider = this.providers.get(agent);
    if (!provider) {
      throw new UnknownProviderError(agent);
    }
    if (!provider.isConfigured()) {
      throw new ProviderNotConfiguredError(provider.name, provider.notConfiguredReason());
    }

    const normalized: CompletionRequest = { ...request, agent: provider.name };
    const model = normalized.model ?? provider.defaultModel;
    const startedAt = this.clock();

    logUpstream({ event: 'upstream_start', agent: provider.name, model });

    try {
      const response = await this.retryPolicy.execute(() => provider.complete(normalized), {
        name: provider.name,
        onRetry: ({ attempt, delayMs, error }) => {
          logUpstream({
            event: 'upstream_retry',
            agent: provider.name,
            model,
            attempt: attempt + 1,
            delayMs,
            ...(error instanceof UpstreamHttpError ? { status: error.upstreamStatus } : {}),
            error: errorMessage(error),
          });
          this.metrics?.recordRetry(provider.name);
        },
      });

      const durationMs = this.clock() - startedAt;
      this.metrics?.observeCompletion(provider.name, 'success', durationMs / 1000);
      logUpstream({ event: 'upstream_complete', agent: provider.name, model: response.model, durationMs });

      return response;
    } catch (error) {
      const durationMs = this.clock() - startedAt;
      this.metrics?.observeCompletion(provider.name, 'error', durationMs / 1000);
      logUpstream({
        event: 'upstream_error',
        agent: provider.name,
        model,
        durationMs,
        ...(error instanceof UpstreamHttpError ? { status: error.upstreamStatus } : {}),
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Every known agent with whether it can currently serve requests
   */
  public listAgents(): Record<string, AgentInfo> {
    const agents: Record<string, AgentInfo> = {};
    for (const provider of this.providers.values()) {
      agents[provider.name] = {
        available: provider.isConfigured(),
        models: [...provider.models],
        ...(provider.note ? { note: provider.note } : {}),
      };
    }
    return agents;
  }
}

export function createAgentGateway(options: AgentGatewayOptions): AgentGateway {
  return new AgentGateway(options);
}

export default AgentGateway;
