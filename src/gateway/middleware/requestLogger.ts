/**
 * Agent Gateway - Request Logging Middleware
 * Logs each request once its response has been sent
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

import { logRequest, type RequestLogData } from '../../utils/logger.js';

export interface RequestLoggerOptions {
  /** Paths logged at no level, matched by prefix */
  skipPaths?: string[];
}

export function requestLogger(options: RequestLoggerOptions = {}): RequestHandler {
  const { skipPaths = ['/healthz', '/metrics'] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((path) => req.path.startsWith(path))) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();

    res.on('finish', () => {
      const logData: RequestLogData = {
        requestId: req.requestId ?? 'unknown',
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startTime,
        ipAddress: req.ip,
        userAgent: req.headers['user-agent'],
      };

      if (req.user) {
        logData.userId = req.user.id;
      }

      logRequest(logData);
    });

    next();
  };
}

export default requestLogger;
