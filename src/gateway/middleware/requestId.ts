/**
 * Agent Gateway - Request ID Middleware
 * Assigns a correlation identifier to each incoming request
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';

import '../../utils/types.js';

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';
const MAX_INBOUND_ID_LENGTH = 128;

/**
 * Reuses a caller-supplied X-Request-ID when it is short and printable,
 * otherwise generates a UUID. The id is echoed on the response.
 */
export function requestIdMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const inbound = req.headers[REQUEST_ID_HEADER];
    const candidate = Array.isArray(inbound) ? inbound[0] : inbound;
    const requestId =
      candidate && candidate.length <= MAX_INBOUND_ID_LENGTH && /^[\w.:-]+$/.test(candidate)
        ? candidate
        : uuidv4();

    req.requestId = requestId;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

export default requestIdMiddleware;
