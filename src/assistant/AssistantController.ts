/**
 * Assistant Controller
 * Handles /ask-ai, /explain-syntax and /check-code
 */

import { Request, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import type { AssistantService } from './AssistantService.js';
import {
  askAiSchema,
  checkCodeSchema,
  explainSyntaxSchema,
  type AssistantResponse,
} from './types.js';
import { InternalError, SchemaMismatchError, toErrorBody } from '../types/errors.js';
import { getRequestId } from '../middleware/RequestIdMiddleware.js';
import { truncateDiagnostic } from '../utils/truncateResponse.js';
import { DIAGNOSTIC_LOG_MAX_LENGTH } from '../config/sessionConfig.js';
import { createLogger } from '../logger/index.js';

export class AssistantController {
  // Logger for AssistantController
  private logger = createLogger('AssistantController');

  constructor(private service: AssistantService) {}

  /**
   * POST /ask-ai
   */
  askAi = (req: Request, res: Response): Promise<void> =>
    this.run(req, res, askAiSchema, (body, signal) => this.service.askAi(body, signal));

  /**
   * POST /explain-syntax
   */
  explainSyntax = (req: Request, res: Response): Promise<void> =>
    this.run(req, res, explainSyntaxSchema, (body, signal) => this.service.explainSyntax(body, signal));

  /**
   * POST /check-code
   */
  checkCode = (req: Request, res: Response): Promise<void> =>
    this.run(req, res, checkCodeSchema, (body, signal) => this.service.checkCode(body, signal));

  private async run<T>(
    req: Request,
    res: Response,
    schema: ZodType<T, ZodTypeDef, unknown>,
    handler: (body: T, signal: AbortSignal) => Promise<AssistantResponse>
  ): Promise<void> {
    const requestId = getRequestId(req);
    const abortController = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        abortController.abort();
      }
    };
    res.on('close', onClose);

    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new SchemaMismatchError(
          `Invalid request body: ${issue.path.join('.') || 'body'} ${issue.message}`,
          issue.path.join('.') || undefined
        );
      }

      const result = await handler(parsed.data, abortController.signal);
      res.json(result);
    } catch (error) {
      const gatewayError = InternalError.from(error);
      const context = {
        requestId,
        path: req.path,
        kind: gatewayError.kind,
        diagnostic: gatewayError.diagnostic
          ? truncateDiagnostic(gatewayError.diagnostic, DIAGNOSTIC_LOG_MAX_LENGTH)
          : undefined,
      };
      if (gatewayError.status >= 500) {
        this.logger.error({ ...context, error: gatewayError.cause ?? error }, gatewayError.message);
      } else {
        this.logger.warn(context, gatewayError.message);
      }

      if (!res.headersSent && !res.destroyed) {
        res.status(gatewayError.status).json(toErrorBody(gatewayError, requestId));
      }
    } finally {
      res.off('close', onClose);
    }
  }
}
