/**
 * Agent Gateway - Rate Limit Middleware
 * Express middleware for enforcing rate limits with proper response headers
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

import '../utils/types.js';

import type { RateLimiter, RateLimitCheckResult } from './limiter.js';
import type { KeyFunction, RateLimitContext, RateLimitHeaders } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface RateLimitMiddlewareOptions {
  /** Rate limiter instance */
  limiter: RateLimiter;

  /** Policy name reported to onDecision, e.g. 'completion' */
  policy?: string;

  /** Derives the identity key; defaults to user id, then client IP */
  keyFunction?: KeyFunction;

  /** Function to extract user ID from request; defaults to the authenticated user */
  extractUserId?: (req: Request) => string | undefined;

  /** Whether to skip rate limiting for certain requests */
  skip?: (req: Request) => boolean;

  /** Called once per checked request, for metrics */
  onDecision?: (policy: string, result: RateLimitCheckResult) => void;
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Client address as Express resolved it. Forwarding headers only count when
 * the app's `trust proxy` setting says so.
 */
export function extractClientIP(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? '0.0.0.0';
}

/**
 * Only an upstream auth layer may name the user; request headers are not trusted
 */
function defaultExtractUserId(req: Request): string | undefined {
  return req.user?.id;
}

function buildContext(req: Request, options: RateLimitMiddlewareOptions): RateLimitContext {
  const userId = options.extractUserId ? options.extractUserId(req) : defaultExtractUserId(req);

  return {
    ip: extractClientIP(req),
    ...(userId ? { userId } : {}),
    path: req.path,
    method: req.method,
  };
}

/**
 * Set rate limit headers on response
 */
function setRateLimitHeaders(res: Response, headers: RateLimitHeaders): void {
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      res.setHeader(name, value);
    }
  }
}

// =============================================================================
// Middleware Factory
// =============================================================================

/**
 * Create rate limit middleware. Bypassed requests pass through without headers;
 * checked requests carry the X-RateLimit-* headers, and denials end in a 429.
 */
export function createRateLimitMiddleware(options: RateLimitMiddlewareOptions): RequestHandler {
  const { limiter, skip, onDecision, keyFunction, policy = 'default' } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skip && skip(req)) {
      next();
      return;
    }

    let result: RateLimitCheckResult;
    try {
      result = limiter.check(buildContext(req, options), keyFunction);
    } catch (error) {
      next(error);
      return;
    }

    if (result.bypassed) {
      next();
      return;
    }

    onDecision?.(policy, result);
    setRateLimitHeaders(res, limiter.generateHeaders(result));

    if (!result.allowed) {
      res.status(429).json(limiter.generateErrorBody(result));
      return;
    }

    res.locals['rateLimit'] = result;
    next();
  };
}
