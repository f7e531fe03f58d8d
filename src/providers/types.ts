/**
 * Agent Gateway - Provider Types
 * Request and response shapes shared by every upstream LLM provider
 */

import { z } from 'zod';

// =============================================================================
// Agents
// =============================================================================

export const AGENT_NAMES = ['openai', 'claude', 'lmstudio', 'ollama'] as const;

export type AgentName = (typeof AGENT_NAMES)[number];

export function isAgentName(value: string): value is AgentName {
  return AGENT_NAMES.some((name) => name === value);
}

// =============================================================================
// Completion Request / Response
// =============================================================================

export const CompletionRequestSchema = z.object({
  prompt: z.string().min(1),
  agent: z.string().min(1).default('openai'),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().min(1).default(2048),
  /** Accepted for compatibility; responses are always returned whole */
  stream: z.boolean().default(false),
});

export type CompletionRequestInput = z.input<typeof CompletionRequestSchema>;
export type CompletionRequest = z.output<typeof CompletionRequestSchema>;

export type Usage = Record<string, unknown>;

export interface CompletionResponse {
  content: string;
  agent: AgentName;
  model: string;
  usage?: Usage;
}

// =============================================================================
// Provider Interface
// =============================================================================

export interface AgentInfo {
  available: boolean;
  models: string[];
  note?: string;
}

/**
 * One upstream LLM backend. `complete` makes exactly one attempt; retries
 * belong to the caller.
 */
export interface LLMProvider {
  readonly name: AgentName;
  readonly models: readonly string[];
  /** Model used when a request names none */
  readonly defaultModel: string;
  readonly note?: string;

  /** False when required credentials are missing */
  isConfigured(): boolean;

  /** Why the provider cannot be used, when it is not configured */
  notConfiguredReason(): string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export type FetchLike = typeof fetch;

export interface ProviderHttpOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
  fetchImpl?: FetchLike;
}
