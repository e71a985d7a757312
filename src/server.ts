import { createServer } from 'node:http';
import { createApp } from './app.js';
import { env } from './config/env.js';
import logger from './config/logger.js';
import { createContainer } from './container.js';

const { database, tracker } = createContainer();
const server = createServer(createApp({ tracker, database }));

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info({ signal }, 'Shutting down gracefully');

  server.close(() => {
    logger.info('HTTP server closed');

    database
      .end()
      .then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error closing database connections');
        process.exit(1);
      });
  });

  // Force close after 10 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 10000).unref();
};

// Handle signals
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', reason => {
  logger.fatal({ reason }, 'Unhandled rejection');
  process.exit(1);
});

process.on('uncaughtException', error => {
  logger.fatal({ err: error }, 'Uncaught exception');
  process.exit(1);
});

// The cache tables must exist before the first request reaches a repository
const start = async () => {
  const info = await database.checkConnection();
  logger.info({ database: info.database }, 'Database connection established');

  await database.ensureSchema();

  server.listen(env.PORT, () => {
    logger.info({ environment: env.NODE_ENV, port: env.PORT }, 'Server listening');
  });
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Database initialization failed');
  process.exit(1);
});
