// Load environment variables
import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './api/app';
import { createDataStore } from './core/DataStore';
import { logger } from './utils/logger';
import configManager from './config/app';

const appConfig = configManager.getAppConfig();
const PORT = appConfig.port;
const NODE_ENV = appConfig.nodeEnv;

/**
 * Start the API server
 */
function startServer(): void {
  logger.info('Starting People Records API server', {
    port: PORT,
    environment: NODE_ENV,
    nodeVersion: process.version,
  });

  // One store for the life of the process; records vanish on restart
  const store = createDataStore();
  const app = createApp(store);

  const server = app.listen(PORT, () => {
    logger.info('API server started successfully', {
      port: PORT,
      environment: NODE_ENV,
      processId: process.pid,
    });
  });

  server.on('error', error => {
    logger.error('API server failed to listen', { port: PORT, error: error.message });
    process.exit(1);
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown`);

    server.close(error => {
      if (error) {
        logger.error('Error during API server shutdown', { error: error.message });
        process.exit(1);
      }

      logger.info('HTTP server closed', {
        addresses: store.addresses.count(),
        persons: store.persons.count(),
        ages: store.ages.count(),
        jobs: store.jobs.count(),
      });
      process.exit(0);
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced API server shutdown due to timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', error => {
    logger.error('Uncaught exception in API server', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled promise rejection in API server', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    process.exit(1);
  });
}

startServer();
