import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Propagate the caller's x-request-id, or mint one, and echo it back
 */
export class RequestIdMiddleware {
  assign = (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.headers[REQUEST_ID_HEADER];
    const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
    const requestId = candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();

    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  };
}

/**
 * Request id assigned by RequestIdMiddleware, minting one if it did not run
 */
export function getRequestId(req: Request): string {
  if (!req.requestId) {
    req.requestId = randomUUID();
  }
  return req.requestId;
}
