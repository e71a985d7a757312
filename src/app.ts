import express, { type Express } from 'express';
import helmet from 'helmet';
import compression from 'compression';
import { pinoHttp } from 'pino-http';

import logger from './config/logger.js';
import { REQUIRED_TABLES } from './db/index.js';
import { corsMiddleware } from './middlewares/cors.js';
import { globalRateLimit } from './middlewares/rateLimit.js';
import { errorHandler } from './middlewares/error.js';
import { notFoundHandler } from './middlewares/notFound.js';
import { createRoutes } from './routes.js';
import type { ReleaseTracker } from './tracker/tracker.service.js';

/** What the health check needs from the database */
export interface HealthProbe {
  checkConnection(): Promise<{ database: string; now: Date }>;
  checkTables(): Promise<Record<string, boolean>>;
}

export interface AppDependencies {
  tracker: ReleaseTracker;
  database: HealthProbe;
}

export function createApp({ tracker, database }: AppDependencies): Express {
  const app = express();

  // Trust proxy for accurate client IPs (when behind reverse proxy)
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  // CORS
  app.use(corsMiddleware);

  // Compression
  app.use(compression());

  // Request logging
  app.use(pinoHttp({ logger }));

  // Rate limiting
  app.use(globalRateLimit);

  // Health check endpoint with database diagnostics
  app.get('/health', async (_req, res) => {
    const startTime = Date.now();
    let connected = false;
    let tables: Record<string, boolean> = {};

    try {
      await database.checkConnection();
      connected = true;
      tables = await database.checkTables();
    } catch (error) {
      logger.error({ err: error, duration: Date.now() - startTime }, 'Health check database error');
    }

    const ready = connected && REQUIRED_TABLES.every(table => tables[table]);
    logger.debug({ connected, tables, duration: Date.now() - startTime }, 'Health check completed');

    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: { connected, tables },
    });
  });

  // API routes
  app.use('/api', createRoutes(tracker));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
