/**
 * Agent Gateway - Providers Module
 */

import type { ProvidersConfig } from '../config/schema.js';

import { AnthropicProvider } from './anthropic.js';
import { OllamaProvider } from './ollama.js';
import { LMStudioProvider, OpenAIProvider } from './openai.js';
import type { FetchLike, LLMProvider } from './types.js';

/**
 * Build every provider from configuration. Providers without credentials are
 * still created so they can be listed as unavailable.
 */
export function createProviders(config: ProvidersConfig, fetchImpl?: FetchLike): LLMProvider[] {
  const { timeoutMs } = config;

  return [
    new OpenAIProvider({ ...config.openai, timeoutMs, fetchImpl }),
    new AnthropicProvider({ ...config.claude, timeoutMs, fetchImpl }),
    new LMStudioProvider({ ...config.lmstudio, timeoutMs, fetchImpl }),
    new OllamaProvider({ ...config.ollama, timeoutMs, fetchImpl }),
  ];
}

export { AnthropicProvider } from './anthropic.js';
export { OllamaProvider } from './ollama.js';
export { OpenAICompatibleProvider, OpenAIProvider, LMStudioProvider } from './openai.js';
export { postJson, parseUpstream } from './http.js';
export {
  AGENT_NAMES,
  CompletionRequestSchema,
  isAgentName,
  type AgentInfo,
  type AgentName,
  type CompletionRequest,
  type CompletionRequestInput,
  type CompletionResponse,
  type FetchLike,
  type LLMProvider,
  type Usage,
} from './types.js';
