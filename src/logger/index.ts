import pino, { Logger } from 'pino';
import { loggerConfig, loggingConfig } from './LoggerConfig.js';

/**
 * Root logger instance
 * Used for application-level logging
 */
export const rootLogger: Logger = pino(loggerConfig);

/**
 * Create a child logger with a specific name and optional context
 *
 * @param name - Logger name (e.g., 'SessionPool', 'GatewayDispatcher')
 * @param context - Optional context object (e.g., { requestId, resource })
 * @returns Child logger instance
 *
 * @example
 * const logger = createLogger('BackendConnector', { entity: 'Catalog.Items' });
 * logger.info('Upstream call completed');
 * // Output: {"level":"info","name":"BackendConnector","entity":"Catalog.Items","msg":"Upstream call completed"}
 */
export function createLogger(name: string, context?: Record<string, unknown>): Logger {
  return rootLogger.child({
    name,
    ...context,
  });
}

export { loggingConfig };

export type { Logger };

rootLogger.info(
  {
    level: loggingConfig.level,
    pretty: loggingConfig.prettyPrint,
    env: loggingConfig.isDevelopment ? 'development' : 'production',
  },
  'Logger initialized'
);
