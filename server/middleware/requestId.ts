/**
 * Request ID Middleware
 *
 * Generates or extracts request ID and adds it to request/response context.
 * Request ID is used for tracing a claim run across log lines.
 */

import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Extract or generate request ID from headers
 */
export function getRequestId(req: Request): string {
  return headerValue(req.headers['x-request-id']) ||
         headerValue(req.headers['x-correlation-id']) ||
         randomUUID();
}

/**
 * Middleware to add request ID to all requests
 *
 * Adds request ID to:
 * - req.id (for use in route handlers)
 * - res.locals.requestId (for use in response helpers)
 * - Response header X-Request-ID
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = getRequestId(req);

  req.id = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

// Extend Express types
declare global {
  namespace Express {
    interface Request {
      id?: string;
    }
  }
}
