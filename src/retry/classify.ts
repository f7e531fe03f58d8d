/**
 * Agent Gateway - Failure Classification
 * Decides which upstream failures are worth another attempt
 */

import {
  TRANSIENT_UPSTREAM_STATUSES,
  UpstreamHttpError,
  UpstreamNetworkError,
} from '../utils/types.js';

/**
 * Socket and DNS error codes that indicate the connection, not the request, failed
 */
export const RETRYABLE_NETWORK_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function readCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function hasRetryableCode(error: unknown): boolean {
  const code = readCode(error);
  if (code && RETRYABLE_NETWORK_CODES.has(code)) {
    return true;
  }
  const cause = error instanceof Error ? error.cause : undefined;
  const causeCode = readCode(cause);
  return causeCode !== undefined && RETRYABLE_NETWORK_CODES.has(causeCode);
}

/**
 * True for transient network failures and for upstream statuses
 * 429, 500, 502, 503 and 504. Everything else is permanent.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof UpstreamHttpError) {
    return TRANSIENT_UPSTREAM_STATUSES.has(error.upstreamStatus);
  }

  if (error instanceof UpstreamNetworkError) {
    return true;
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return true;
  }

  return hasRetryableCode(error);
}
