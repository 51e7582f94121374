import { Request, Response, NextFunction } from 'express';
import {
  InternalError,
  SchemaMismatchError,
  UnknownResourceError,
  toErrorBody,
  type GatewayError,
} from '../types/errors.js';
import { getRequestId } from './RequestIdMiddleware.js';
import { createLogger } from '../logger/index.js';

/**
 * Errors raised by express.json() carry a `type` such as "entity.parse.failed"
 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (error instanceof Error && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/**
 * Last-resort error handling for anything that escaped a controller
 */
export class ErrorMiddleware {
  // Logger for ErrorMiddleware
  private logger = createLogger('ErrorMiddleware');

  /**
   * Unmatched routes
   */
  notFound = (req: Request, res: Response): void => {
    const error = new UnknownResourceError(`No route for ${req.method} ${req.path}`);
    res.status(error.status).json(toErrorBody(error, getRequestId(req)));
  };

  handle = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const type = bodyParserErrorType(err);
    let error: GatewayError;
    if (type === 'entity.parse.failed') {
      error = new SchemaMismatchError('Request body is not valid JSON');
    } else if (type !== undefined && (type.startsWith('entity.') || type.endsWith('.unsupported'))) {
      error = new SchemaMismatchError('Request body cannot be read');
    } else {
      error = InternalError.from(err);
    }

    const requestId = getRequestId(req);
    if (error.status >= 500) {
      this.logger.error({ error: err, requestId, method: req.method, path: req.path }, 'Unhandled request error');
    } else {
      this.logger.warn({ requestId, method: req.method, path: req.path, type }, error.message);
    }

    res.status(error.status).json(toErrorBody(error, requestId));
  };
}
