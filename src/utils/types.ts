/**
 * Agent Gateway - Shared Type Definitions
 * Request augmentation and the error hierarchy used across the gateway
 */

// =============================================================================
// Request Augmentation
// =============================================================================

export interface AuthenticatedUser {
  id: string;
}

declare global {
  namespace Express {
    interface Request {
      /** Correlation id assigned by the request-id middleware */
      requestId?: string;
      /** Epoch milliseconds when the gateway first saw the request */
      startTime?: number;
      /** Set by an upstream authentication layer, when present */
      user?: AuthenticatedUser;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class GatewayError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'GatewayError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends GatewayError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 400, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND', true);
    this.name = 'NotFoundError';
  }
}

export class UnknownProviderError extends GatewayError {
  public readonly agent: string;

  constructor(agent: string) {
    super(`Unknown agent: ${agent}`, 400, 'UNKNOWN_AGENT', true);
    this.name = 'UnknownProviderError';
    this.agent = agent;
  }
}

export class ProviderNotConfiguredError extends GatewayError {
  public readonly agent: string;

  constructor(agent: string, message = `Agent '${agent}' is not configured`) {
    super(message, 503, 'PROVIDER_NOT_CONFIGURED', true);
    this.name = 'ProviderNotConfiguredError';
    this.agent = agent;
  }
}

/** Statuses an upstream may return that signal a transient condition. */
export const TRANSIENT_UPSTREAM_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/**
 * Upstream answered with a non-2xx status. Transient statuses surface as 502;
 * permanent client errors keep the upstream status.
 */
export class UpstreamHttpError extends GatewayError {
  public readonly agent: string;
  public readonly upstreamStatus: number;
  public readonly responseBody: string;

  constructor(agent: string, upstreamStatus: number, responseBody = '') {
    const statusCode =
      TRANSIENT_UPSTREAM_STATUSES.has(upstreamStatus) || upstreamStatus >= 500
        ? 502
        : upstreamStatus;
    super(`${agent} responded with HTTP ${upstreamStatus}`, statusCode, 'UPSTREAM_HTTP_ERROR', true);
    this.name = 'UpstreamHttpError';
    this.agent = agent;
    this.upstreamStatus = upstreamStatus;
    this.responseBody = responseBody;
  }
}

/** The upstream could not be reached, or did not answer in time. */
export class UpstreamNetworkError extends GatewayError {
  public readonly agent: string;

  constructor(agent: string, message: string, cause?: unknown) {
    super(`${agent} unreachable: ${message}`, 503, 'UPSTREAM_UNAVAILABLE', true, { cause });
    this.name = 'UpstreamNetworkError';
    this.agent = agent;
  }
}

/** The upstream answered 2xx with a body the gateway cannot interpret. */
export class UpstreamResponseError extends GatewayError {
  public readonly agent: string;

  constructor(agent: string, message: string) {
    super(`${agent} returned an invalid response: ${message}`, 502, 'UPSTREAM_BAD_RESPONSE', true);
    this.name = 'UpstreamResponseError';
    this.agent = agent;
  }
}

// =============================================================================
// Utility Types
// =============================================================================

/** Millisecond clock, injectable for tests */
export type Clock = () => number;
