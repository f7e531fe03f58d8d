/**
 * Agent Gateway - Error Handler Middleware
 * Centralized error handling for the gateway
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

import logger from '../../utils/logger.js';
import { isProduction } from '../../utils/helpers.js';
import { GatewayError, UpstreamHttpError, ValidationError } from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: string[];
  upstreamStatus?: number;
}

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Central error handling middleware
 * Catches all errors and returns appropriate JSON responses
 */
export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorResponse = buildErrorResponse(error, req.requestId);

  logError(error, req, errorResponse);

  if (res.headersSent) {
    res.end();
    return;
  }

  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Build a standardized error response object
 */
export function buildErrorResponse(err: Error, requestId?: string): ErrorResponse {
  if (err instanceof GatewayError) {
    const response: ErrorResponse = {
      error: err.message,
      code: err.code,
      statusCode: err.statusCode,
    };

    if (requestId) {
      response.requestId = requestId;
    }

    if (err instanceof ValidationError && err.validationErrors.length > 0) {
      response.details = err.validationErrors;
    }

    if (err instanceof UpstreamHttpError) {
      response.upstreamStatus = err.upstreamStatus;
    }

    return response;
  }

  // Errors raised by Express itself or body-parser carry their own status
  if ('statusCode' in err && typeof err.statusCode === 'number' && err.statusCode >= 400) {
    return {
      error: err.message || 'An error occurred',
      code: 'HTTP_ERROR',
      statusCode: err.statusCode,
      ...(requestId ? { requestId } : {}),
    };
  }

  return {
    error: isProduction() ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    ...(requestId ? { requestId } : {}),
  };
}

/**
 * Log error with appropriate level and context
 */
function logError(err: Error, req: Request, errorResponse: ErrorResponse): void {
  const logContext = {
    requestId: errorResponse.requestId,
    method: req.method,
    path: req.path,
    statusCode: errorResponse.statusCode,
    errorCode: errorResponse.code,
    ip: req.ip,
  };

  if (errorResponse.statusCode >= 500) {
    logger.error(err.message, {
      ...logContext,
      stack: err.stack,
    });
  } else {
    logger.warn(err.message, logContext);
  }
}

// =============================================================================
// Not Found Handler
// =============================================================================

/**
 * Handle 404 Not Found errors
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const errorResponse: ErrorResponse = {
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
    ...(req.requestId ? { requestId: req.requestId } : {}),
  };

  logger.warn('Route not found', {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
  });

  res.status(404).json(errorResponse);
};

// =============================================================================
// Async Handler Wrapper
// =============================================================================

/**
 * Wrap async route handlers to properly catch and forward errors
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
