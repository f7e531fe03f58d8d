/**
 * Agent Gateway - Metrics Middleware
 *
 * Counts every finished request by method, matched route and status code.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

import type { MetricsService } from './metrics.js';

export interface MetricsMiddlewareOptions {
  /** Skip metrics collection for certain paths */
  skipPaths?: string[];
}

const DEFAULT_SKIP_PATHS = ['/metrics', '/favicon.ico'];

/**
 * Route pattern the request matched, so label values stay bounded
 */
function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return 'unmatched';
}

export function createMetricsMiddleware(
  metrics: MetricsService,
  options: MetricsMiddlewareOptions = {}
): RequestHandler {
  const skipPaths = options.skipPaths ?? DEFAULT_SKIP_PATHS;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.includes(req.path)) {
      next();
      return;
    }

    res.on('finish', () => {
      metrics.recordHttpRequest(req.method, routeLabel(req), res.statusCode);
    });

    next();
  };
}
