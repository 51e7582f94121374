import express, { Express } from 'express';
import http from 'http';
import cors from 'cors';
import { APP_INFO, loadGatewayConfig, type GatewayConfig } from './config/config.js';
import { loadResourceMapping, type ResourceMapping } from './config/resourceMapping.js';
import { createLogger } from './logger/index.js';
import type { IUpstreamTransport } from './gateway/transport/IUpstreamTransport.js';
import { ODataUpstreamTransport } from './gateway/transport/ODataUpstreamTransport.js';
import { AuthStrategyFactory } from './gateway/auth/AuthStrategyFactory.js';
import { SessionPool } from './gateway/core/SessionPool.js';
import { BackendConnector } from './gateway/core/BackendConnector.js';
import { RequestTranslator } from './gateway/core/RequestTranslator.js';
import { GatewayDispatcher } from './gateway/core/GatewayDispatcher.js';
import { GatewayRouter } from './gateway/GatewayRouter.js';
import { AssistantClient } from './assistant/AssistantClient.js';
import { AssistantService } from './assistant/AssistantService.js';
import { AssistantRouter } from './assistant/AssistantRouter.js';
import { RequestIdMiddleware } from './middleware/RequestIdMiddleware.js';
import { ErrorMiddleware } from './middleware/ErrorMiddleware.js';

const NODE_ENV = process.env.NODE_ENV || 'development';
const isDevelopment = NODE_ENV === 'development';

// Create loggers for different functional modules to improve log distinction
const appLogger = createLogger('App'); // Application startup/initialization
const requestLogger = createLogger('Request'); // HTTP request debugging
const serverLogger = createLogger('Server'); // Server startup/shutdown

/**
 * Shutdown flag - prevents duplicate shutdown process triggering
 */
let isShuttingDown = false;

export interface GatewayModule {
  config: GatewayConfig;
  mapping: ResourceMapping;
  transport: IUpstreamTransport;
  sessionPool: SessionPool;
  connector: BackendConnector;
  translator: RequestTranslator;
  dispatcher: GatewayDispatcher;
  assistant?: {
    client: AssistantClient;
    service: AssistantService;
  };
}

/**
 * Collaborators replaced in tests
 */
export interface GatewayModuleOverrides {
  transport?: IUpstreamTransport;
  mapping?: ResourceMapping;
  assistantClient?: AssistantClient;
}

/**
 * Initialize the gateway core and its collaborators
 */
export function initializeGatewayModule(config: GatewayConfig, overrides: GatewayModuleOverrides = {}): GatewayModule {
  appLogger.info({ upstream: config.upstream.baseUrl, scheme: config.upstream.authScheme }, 'Initializing gateway module...');

  // 1. Resource mapping (validated and frozen)
  const mapping = overrides.mapping ?? loadResourceMapping(config.resourceMappingPath);

  // 2. Upstream transport with the configured auth strategy
  const transport = overrides.transport ?? new ODataUpstreamTransport(
    { baseUrl: config.upstream.baseUrl },
    AuthStrategyFactory.create(config.upstream.authScheme, {
      baseUrl: config.upstream.baseUrl,
      probePath: config.upstream.probePath,
    })
  );

  // 3. Session pool and connector
  const sessionPool = new SessionPool(transport, {
    ttlSeconds: config.sessions.ttlSeconds,
    maxActive: config.sessions.maxActive,
    authTimeoutMs: config.upstream.authTimeoutMs,
  });
  const connector = new BackendConnector(transport, sessionPool, { timeoutMs: config.upstream.timeoutMs });

  // 4. Translator and dispatcher
  const translator = new RequestTranslator(mapping);
  const dispatcher = new GatewayDispatcher(translator, connector, {
    basePath: config.basePath,
    serviceCredentials: config.upstream.serviceCredentials,
    timeoutMs: config.upstream.timeoutMs,
  });

  // 5. Assistant (only with a token)
  let assistant: GatewayModule['assistant'];
  if (config.assistant) {
    const client = overrides.assistantClient ?? new AssistantClient(config.assistant);
    assistant = { client, service: new AssistantService(client) };
    appLogger.info({ baseUrl: config.assistant.baseUrl }, 'Assistant module enabled');
  }

  appLogger.info({ transport: transport.name }, 'Gateway module initialized successfully');

  return { config, mapping, transport, sessionPool, connector, translator, dispatcher, assistant };
}

/**
 * Build the Express application for a gateway module
 */
export function createApp(module: GatewayModule): Express {
  const app = express();
  const requestIdMiddleware = new RequestIdMiddleware();
  const errorMiddleware = new ErrorMiddleware();

  // ==================== General middleware ====================

  app.use(cors({
    origin: '*',
    exposedHeaders: ['Location', 'WWW-Authenticate', 'X-Request-Id'],
  }));

  app.use(requestIdMiddleware.assign);

  // Body parser middleware - must be before middleware that needs to access req.body
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    if (isDevelopment) {
      requestLogger.debug({
        requestId: req.requestId,
        method: req.method,
        url: req.url,
      }, 'Received request');
    }
    next();
  });

  // ==================== Service endpoints ====================

  // Root path handler - returns basic service information
  app.get('/', (req, res) => {
    res.json({
      service: APP_INFO.name,
      version: APP_INFO.version,
      status: 'running',
      endpoints: {
        health: '/health',
        gateway: `${module.config.basePath === '/' ? '' : module.config.basePath}/{resource}[/{id}]`,
        resources: Object.keys(module.mapping.resources),
        ...(module.assistant && {
          assistant: ['/ask-ai', '/explain-syntax', '/check-code'],
        }),
      },
    });
  });

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: {
        active: module.sessionPool.getActiveSessionCount(),
        leased: module.sessionPool.getLeasedSessionCount(),
        pendingHandshakes: module.sessionPool.getPendingHandshakeCount(),
      },
      assistant: {
        enabled: module.assistant !== undefined,
        conversations: module.assistant?.client.conversations.size ?? 0,
      },
      memory: process.memoryUsage(),
    });
  });

  // ==================== Assistant route registration ====================

  if (module.assistant) {
    new AssistantRouter(module.assistant.service).registerRoutes(app);
  }

  // ==================== Gateway route registration ====================

  new GatewayRouter(module.dispatcher).registerRoutes(app, module.config.basePath);

  app.use(errorMiddleware.notFound);
  app.use(errorMiddleware.handle);

  return app;
}

/**
 * Application main entry point
 */
export async function startApplication(): Promise<void> {
  try {
    const config = loadGatewayConfig();
    const gatewayModule = initializeGatewayModule(config);
    gatewayModule.sessionPool.startCleanupTimer();

    const app = createApp(gatewayModule);
    const server = http.createServer(app);
    server.listen(config.port, () => {
      serverLogger.info({ port: config.port, basePath: config.basePath }, 'Gateway HTTP server listening');
    });

    // Graceful shutdown handling
    const shutdown = async (signal: string) => {
      // Prevent duplicate shutdown process execution
      if (isShuttingDown) {
        serverLogger.debug({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      serverLogger.info({ signal }, 'Shutting down gracefully...');

      // Set forced exit timeout
      const forceExitTimer = setTimeout(() => {
        serverLogger.error('Shutdown timeout exceeded, forcing exit');
        process.exit(1);
      }, config.shutdownTimeoutMs + 5000);

      try {
        // 1. Stop accepting connections and let in-flight requests drain
        await new Promise<void>((resolve) => {
          const drainTimer = setTimeout(() => {
            serverLogger.warn({ timeoutMs: config.shutdownTimeoutMs }, 'Drain timeout exceeded, closing connections');
            server.closeAllConnections();
            resolve();
          }, config.shutdownTimeoutMs);

          server.close(() => {
            clearTimeout(drainTimer);
            serverLogger.info('HTTP server closed');
            resolve();
          });
          server.closeIdleConnections();
        });

        // 2. Log out every upstream session
        await gatewayModule.connector.shutdown();

        // 3. Forget assistant conversations
        gatewayModule.assistant?.client.close();
      } catch (error) {
        serverLogger.error({ error }, 'Error during shutdown');
      } finally {
        clearTimeout(forceExitTimer);
        serverLogger.info('Shutdown complete');
        process.exit(0);
      }
    };

    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });

    // Unhandled exception capture
    process.on('uncaughtException', (error) => {
      appLogger.error({ error }, 'Uncaught Exception');
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      appLogger.error({ reason }, 'Unhandled Rejection');
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    appLogger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

process.title = 'onec-gateway';
// If this file is run directly
// Check if this module is the main entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  void startApplication();
}
