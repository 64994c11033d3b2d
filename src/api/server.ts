import express, { type Application, type Request, type Response } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../utils/logger.js';
import type { RewardsServices } from '../packages/adapters/rewards/index.js';
import {
  createRateLimiters,
  errorHandler,
  notFoundHandler,
  requireApiKey,
  resolveRequestId,
} from './middleware.js';
import { createAdminRouter } from './routes/admin.routes.js';
import { createNotificationRouter } from './routes/notification.routes.js';
import { createReferralRouter } from './routes/referral.routes.js';
import { createRewardsRouter } from './routes/rewards.routes.js';
import { createTechnicianRouter } from './routes/technician.routes.js';

export interface AppOptions {
  /** API key → staff name */
  adminApiKeys: ReadonlyMap<string, string>;
  /** Probe used by /health; defaults to always healthy */
  isDatabaseHealthy?: () => boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(services: RewardsServices, options: AppOptions): Application {
  const expressApp = express();
  const limiters = createRateLimiters();

  // Trust proxy for X-Forwarded-For headers (needed for rate limiting behind a reverse proxy)
  expressApp.set('trust proxy', 1);

  // Request logging via pino-http; request id doubles as the correlation id
  const httpLogger = pinoHttp({
    logger,
    genReqId: resolveRequestId,
    // Don't log health checks to reduce noise
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },
    serializers: {
      req: (req: IncomingMessage) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },
  });

  expressApp.use(httpLogger);

  // JSON body parsing
  expressApp.use(express.json({ limit: '10kb' }));

  /**
   * GET /health
   */
  expressApp.get('/health', (_req: Request, res: Response) => {
    let healthy = true;
    if (options.isDatabaseHealthy) {
      try {
        healthy = options.isDatabaseHealthy();
      } catch (error) {
        logger.warn({ event: 'health.probe.failed', error }, 'Health probe threw');
        healthy = false;
      }
    }
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
    });
  });

  // Customer and technician routes
  expressApp.use('/api/referrals', limiters.public, createReferralRouter(services));
  expressApp.use('/api/rewards', limiters.public, createRewardsRouter(services));
  expressApp.use('/api/technician', limiters.public, createTechnicianRouter(services));
  if (services.inbox) {
    expressApp.use('/api/notifications', limiters.public, createNotificationRouter(services.inbox));
  }

  // Staff routes
  expressApp.use('/admin', limiters.admin, requireApiKey(options.adminApiKeys), createAdminRouter(services));

  // 404 handler
  expressApp.use(notFoundHandler);

  // Global error handler
  expressApp.use(errorHandler);

  return expressApp;
}

/**
 * Start listening; resolves once the port is bound
 */
export async function startServer(app: Application, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal({ port }, 'Port already in use');
      } else {
        logger.fatal({ error }, 'Failed to start server');
      }
      reject(error);
    });
  });
}

/**
 * Stop accepting connections; forces resolution after 10s
 */
export async function stopServer(server: Server): Promise<void> {
  logger.info('Stopping API server...');

  await new Promise<void>((resolve) => {
    const timeout = setTimeout(() => {
      logger.warn('Forcing server shutdown after timeout');
      resolve();
    }, 10000);

    server.close(() => {
      clearTimeout(timeout);
      logger.info('API server stopped');
      resolve();
    });
  });
}
