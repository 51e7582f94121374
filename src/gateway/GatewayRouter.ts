/**
 * Gateway Router
 * Mounts the resource gateway under its base path
 */

import { Express, Router } from 'express';
import { GatewayController } from './controllers/GatewayController.js';
import type { GatewayDispatcher } from './core/GatewayDispatcher.js';
import { createLogger } from '../logger/index.js';

export class GatewayRouter {
  private gatewayController: GatewayController;

  // Logger for GatewayRouter
  private logger = createLogger('GatewayRouter');

  constructor(dispatcher: GatewayDispatcher) {
    this.gatewayController = new GatewayController(dispatcher);
  }

  /**
   * Register gateway routes
   * @param app Express application instance
   * @param basePath Mount path, e.g. /api
   */
  registerRoutes(app: Express, basePath: string): void {
    const router = Router();

    // Every resource route is decided by the mapping table, not by Express
    router.all('*', this.gatewayController.handle);

    app.use(basePath, router);

    this.logger.info({ basePath }, 'Gateway routes registered successfully');
  }
}
