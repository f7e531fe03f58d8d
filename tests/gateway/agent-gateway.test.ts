/**
 * Agent Gateway - Completion Routing Tests
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';

import { AgentGateway } from '../../src/gateway/agent-gateway.js';
import { MetricsService } from '../../src/monitoring/metrics.js';
import { RetryPolicy } from '../../src/retry/policy.js';
import {
  CompletionRequestSchema,
  type AgentName,
  type CompletionRequest,
  type CompletionResponse,
  type LLMProvider,
} from '../../src/providers/types.js';
import {
  ProviderNotConfiguredError,
  UnknownProviderError,
  UpstreamHttpError,
} from '../../src/utils/types.js';

class FakeProvider implements LLMProvider {
  public readonly models = ['fake-large', 'fake-small'];
  public readonly defaultModel = 'fake-large';
  public readonly complete = jest.fn<(request: CompletionRequest) => Promise<CompletionResponse>>();

  constructor(
    public readonly name: AgentName,
    private readonly configured = true,
    public readonly note?: string
  ) {}

  public isConfigured(): boolean {
    return this.configured;
  }

  public notConfiguredReason(): string {
    return `${this.name} credentials missing`;
  }
}

const reply = (agent: AgentName): CompletionResponse => ({ content: 'pong', agent, model: 'fake-large' });

describe('AgentGateway', () => {
  let openai: FakeProvider;
  let claude: FakeProvider;
  let ollama: FakeProvider;
  let metrics: MetricsService;
  let gateway: AgentGateway;

  beforeEach(() => {
    openai = new FakeProvider('openai');
    claude = new FakeProvider('claude', false);
    ollama = new FakeProvider('ollama', true, 'Requires an Ollama server');
    metrics = new MetricsService();
    gateway = new AgentGateway({
      providers: [openai, claude, ollama],
      retryPolicy: new RetryPolicy({ sleep: () => Promise.resolve() }),
      metrics,
    });
  });

  describe('completion', () => {
    it('should dispatch to the named provider regardless of case', async () => {
      openai.complete.mockResolvedValue(reply('openai'));

      const response = await gateway.completion(CompletionRequestSchema.parse({ prompt: 'ping', agent: 'OpenAI' }));

      expect(response).toEqual(reply('openai'));
      expect(openai.complete).toHaveBeenCalledTimes(1);
      expect(openai.complete.mock.calls[0]?.[0].agent).toBe('openai');
    });

    it('should reject an unknown agent', async () => {
      const error = await gateway
        .completion(CompletionRequestSchema.parse({ prompt: 'ping', agent: 'copilot' }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UnknownProviderError);
      expect(error).toMatchObject({ message: 'Unknown agent: copilot', statusCode: 400 });
    });

    it('should fail fast for a provider without credentials', async () => {
      const error = await gateway
        .completion(CompletionRequestSchema.parse({ prompt: 'ping', agent: 'claude' }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderNotConfiguredError);
      expect(error).toMatchObject({ message: 'claude credentials missing', statusCode: 503 });
      expect(claude.complete).not.toHaveBeenCalled();
    });

    it('should retry transient upstream failures', async () => {
      openai.complete
        .mockRejectedValueOnce(new UpstreamHttpError('openai', 503))
        .mockRejectedValueOnce(new UpstreamHttpError('openai', 429))
        .mockResolvedValueOnce(reply('openai'));

      const response = await gateway.completion(CompletionRequestSchema.parse({ prompt: 'ping' }));

      expect(response.content).toBe('pong');
      expect(openai.complete).toHaveBeenCalledTimes(3);
      const text = await metrics.getMetricsText();
      expect(text).toContain('gateway_upstream_retries_total{agent="openai"} 2');
      expect(text).toContain('gateway_completion_duration_seconds_count{agent="openai",outcome="success"} 1');
    });

    it('should surface a permanent failure after one attempt', async () => {
      const badRequest = new UpstreamHttpError('ollama', 400, 'model not found');
      ollama.complete.mockRejectedValue(badRequest);

      await expect(
        gateway.completion(CompletionRequestSchema.parse({ prompt: 'ping', agent: 'ollama' }))
      ).rejects.toBe(badRequest);

      expect(ollama.complete).toHaveBeenCalledTimes(1);
      const text = await metrics.getMetricsText();
      expect(text).toContain('gateway_completion_duration_seconds_count{agent="ollama",outcome="error"} 1');
    });
  });

  describe('listAgents', () => {
    it('should describe every provider', () => {
      expect(gateway.listAgents()).toEqual({
        openai: { available: true, models: ['fake-large', 'fake-small'] },
        claude: { available: false, models: ['fake-large', 'fake-small'] },
        ollama: { available: true, models: ['fake-large', 'fake-small'], note: 'Requires an Ollama server' },
      });
    });
  });
});
