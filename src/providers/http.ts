/**
 * Agent Gateway - Upstream HTTP Client
 * JSON POST over fetch with a per-attempt timeout and typed failure mapping
 */

import type { z } from 'zod';

import { errorMessage, truncate } from '../utils/helpers.js';
import {
  GatewayError,
  UpstreamHttpError,
  UpstreamNetworkError,
  UpstreamResponseError,
} from '../utils/types.js';

import type { AgentName, FetchLike } from './types.js';

const MAX_ERROR_BODY = 500;

export interface PostJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * POST `body` as JSON and return the parsed response.
 *
 * - non-2xx status: UpstreamHttpError
 * - connection failure or timeout: UpstreamNetworkError
 * - 2xx with a body that is not JSON: UpstreamResponseError
 */
export async function postJson(
  agent: AgentName,
  url: string,
  body: unknown,
  options: PostJsonOptions
): Promise<unknown> {
  const { headers = {}, timeoutMs, fetchImpl = fetch } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        ...headers,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    const text = await response.text();

    if (!response.ok) {
      throw new UpstreamHttpError(agent, response.status, truncate(text, MAX_ERROR_BODY));
    }

    return parseJsonBody(agent, text);
  } catch (error) {
    if (error instanceof GatewayError) {
      throw error;
    }
    const message = controller.signal.aborted
      ? `request timed out after ${timeoutMs}ms`
      : errorMessage(error);
    throw new UpstreamNetworkError(agent, message, error);
  } finally {
    clearTimeout(timeoutId);
  }
}

function parseJsonBody(agent: AgentName, text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new UpstreamResponseError(agent, `body is not JSON (${errorMessage(error)})`);
  }
}

/**
 * Validate an upstream payload against the shape the provider expects
 */
export function parseUpstream<T>(
  agent: AgentName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new UpstreamResponseError(agent, issues);
  }
  return result.data;
}
