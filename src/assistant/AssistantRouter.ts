/**
 * Assistant Router
 * Registers the 1C:AI assistant endpoints
 */

import { Express } from 'express';
import { AssistantController } from './AssistantController.js';
import type { AssistantService } from './AssistantService.js';
import { createLogger } from '../logger/index.js';

export class AssistantRouter {
  private assistantController: AssistantController;

  // Logger for AssistantRouter
  private logger = createLogger('AssistantRouter');

  constructor(service: AssistantService) {
    this.assistantController = new AssistantController(service);
  }

  registerRoutes(app: Express): void {
    app.post('/ask-ai', this.assistantController.askAi);
    app.post('/explain-syntax', this.assistantController.explainSyntax);
    app.post('/check-code', this.assistantController.checkCode);

    this.logger.info('Assistant routes registered successfully');
  }
}
