/**
 * Agent Gateway - Ollama Provider
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

const GenerateResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export interface OllamaProviderOptions extends ProviderHttpOptions {
  baseUrl: string;
  model: string;
  models: readonly string[];
}

export class OllamaProvider implements LLMProvider {
  public readonly name = 'ollama' as const;
  public readonly note = 'Requires an Ollama server';
  public readonly models: readonly string[];
  public readonly defaultModel: string;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: OllamaProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.defaultModel = options.model;
    this.models = options.models;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl;
  }

  public isConfigured(): boolean {
    return true;
  }

  public notConfiguredReason(): string {
    return '';
  }

  public async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const model = request.model ?? this.defaultModel;

    // temperature and max_tokens are not forwarded to /api/generate
    const payload = await postJson(
      this.name,
      `${this.baseUrl}/api/generate`,
      { model, prompt: request.prompt, stream: false },
      { timeoutMs: this.timeoutMs, fetchImpl: this.fetchImpl }
    );

    const data = parseUpstream(this.name, GenerateResponseSchema, payload);
    const usage =
      data.prompt_eval_count !== undefined || data.eval_count !== undefined
        ? { prompt_tokens: data.prompt_eval_count, completion_tokens: data.eval_count }
        : undefined;

    return {
      content: data.response,
      agent: this.name,
      model,
      ...(usage ? { usage } : {}),
    };
  }
}
