/**
 * Agent Gateway - Anthropic Provider
 * Messages API, exposed to clients as the `claude` agent
 */

import { z } from 'zod';

import { postJson, parseUpstream } from './http.js';
import type {
  CompletionRequest,
  CompletionResponse,
  FetchLike,
  LLMProvider,
  ProviderHttpOptions,
} from './types.js';

const ANTHROPIC_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional(),
      })
    )
    .min(1),
  usage: z.record(z.unknown()).optional(),
});

export interface AnthropicProviderOptions extends ProviderHttpOptions {
  baseUrl: string;
  apiKey?: string;
  model: string;
  models: readonly string[];
}

export class AnthropicProvider implements LLMProvider {
  public readonly name = 'claude' as const;
  public readonly models: readonly string[];
  public readonly defaultModel: string;

  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: AnthropicProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.defaultModel = options.model;
    this.models = options.models;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl;
  }

  public isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  public notConfiguredReason(): string {
    return 'Anthropic API key not configured';
  }

  public async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const model = request.model ?? this.defaultModel;

    const payload = await postJson(
      this.name,
      `${this.baseUrl}/messages`,
      {
        model,
        messages: [{ role: 'user', content: request.prompt }],
        max_tokens: request.max_tokens,
        temperature: request.temperature,
      },
      {
        headers: {
          'x-api-key': this.apiKey ?? '',
          'anthropic-version': ANTHROPIC_VERSION,
        },
        timeoutMs: this.timeoutMs,
        fetchImpl: this.fetchImpl,
      }
    );

    const data = parseUpstream(this.name, MessagesResponseSchema, payload);
    const textBlock = data.content.find((block) => block.type === 'text');

    return {
      content: textBlock?.text ?? '',
      agent: this.name,
      model,
      ...(data.usage ? { usage: data.usage } : {}),
    };
  }
}
