/**
 * Gateway Controller
 * Adapts Express requests to the dispatcher and writes its responses
 */

import { Request, Response, NextFunction } from 'express';
import type { GatewayDispatcher } from '../core/GatewayDispatcher.js';
import type { QueryParams } from '../../types/gateway.types.js';
import { getRequestId } from '../../middleware/RequestIdMiddleware.js';
import { createLogger } from '../../logger/index.js';

/**
 * Query parameters in request order, duplicates kept
 */
export function readQueryParams(originalUrl: string): QueryParams {
  return [...new URL(originalUrl, 'http://localhost').searchParams.entries()];
}

export class GatewayController {
  // Logger for GatewayController
  private logger = createLogger('GatewayController');

  constructor(private dispatcher: GatewayDispatcher) {}

  /**
   * Any method on /{resource} or /{resource}/{id}
   */
  handle = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const abortController = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        abortController.abort();
      }
    };
    res.on('close', onClose);

    try {
      const response = await this.dispatcher.handle({
        method: req.method,
        path: req.path,
        query: readQueryParams(req.originalUrl),
        headers: { authorization: req.headers.authorization },
        // express.json() leaves an empty object behind when there is no JSON body
        body: req.is('application/json') ? req.body : undefined,
        requestId: getRequestId(req),
        signal: abortController.signal,
      });

      if (abortController.signal.aborted || res.destroyed) {
        this.logger.debug({ requestId: getRequestId(req), status: response.status }, 'Client went away, response dropped');
        return;
      }

      res.status(response.status).set(response.headers);
      if (response.body === null) {
        res.end();
      } else {
        res.json(response.body);
      }
    } catch (error) {
      next(error);
    } finally {
      res.off('close', onClose);
    }
  };
}
