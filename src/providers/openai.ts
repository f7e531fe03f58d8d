/**
 * Agent Gateway - OpenAI-Compatible Providers
 * Chat completions API, used by OpenAI itself and by LM Studio's local server
 */

import { z } from 'zod';

import { postJson, parseUpstream } from './http.js';
import type {
  AgentName,
  CompletionRequest,
  CompletionResponse,
  FetchLike,
  LLMProvider,
  ProviderHttpOptions,
} from './types.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  usage: z.record(z.unknown()).optional(),
});

export interface OpenAICompatibleOptions extends ProviderHttpOptions {
  baseUrl: string;
  apiKey?: string;
  model: string;
  models: readonly string[];
}

// =============================================================================
// Base Class
// =============================================================================

export abstract class OpenAICompatibleProvider implements LLMProvider {
  public abstract readonly name: AgentName;
  public readonly models: readonly string[];
  public readonly defaultModel: string;

  protected readonly baseUrl: string;
  protected readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: OpenAICompatibleOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.defaultModel = options.model;
    this.models = options.models;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl;
  }

  public abstract isConfigured(): boolean;

  public abstract notConfiguredReason(): string;

  public async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const model = request.model ?? this.defaultModel;
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const payload = await postJson(
      this.name,
      `${this.baseUrl}/chat/completions`,
      {
        model,
        messages: [{ role: 'user', content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.max_tokens,
      },
      { headers, timeoutMs: this.timeoutMs, fetchImpl: this.fetchImpl }
    );

    const data = parseUpstream(this.name, ChatCompletionSchema, payload);
    const [choice] = data.choices;

    return {
      content: choice?.message.content ?? '',
      agent: this.name,
      model,
      ...(data.usage ? { usage: data.usage } : {}),
    };
  }
}

// =============================================================================
// OpenAI
// =============================================================================

export class OpenAIProvider extends OpenAICompatibleProvider {
  public override readonly name = 'openai' as const;

  public override isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  public override notConfiguredReason(): string {
    return 'OpenAI API key not configured';
  }
}

// =============================================================================
// LM Studio
// =============================================================================

export class LMStudioProvider extends OpenAICompatibleProvider {
  public override readonly name = 'lmstudio' as const;
  public readonly note = 'Requires LM Studio running on host';

  public override isConfigured(): boolean {
    return true;
  }

  public override notConfiguredReason(): string {
    return '';
  }
}
