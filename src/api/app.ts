import express, { type Application } from 'express';
import cors from 'cors';
import compression from 'compression';
import { securityConfig } from '../config/security';
import type { DataStore } from '../core/DataStore';
import { createControllers, type ControllerOptions } from './controllers';
import {
  TRACE_HEADER,
  errorHandlerMiddleware,
  notFoundHandler,
  tracingMiddleware,
} from './middlewares';
import { createRoutes } from './routes';

export interface AppOptions extends ControllerOptions {
  /** Body size limit; defaults to MAX_REQUEST_SIZE */
  maxRequestSize?: string;
}

/**
 * Create and configure Express application over the given store
 */
export function createApp(store: DataStore, options: AppOptions = {}): Application {
  const app = express();

  if (securityConfig.trustProxy) {
    app.set('trust proxy', true);
  }

  // CORS configuration
  app.use(
    cors({
      origin: securityConfig.allowedOrigins,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
      allowedHeaders: ['Content-Type', TRACE_HEADER],
      exposedHeaders: [TRACE_HEADER],
    })
  );

  app.use(compression());

  // Tracing first so that body-parsing failures are still correlated
  app.use(tracingMiddleware);

  app.use(
    express.json({
      limit: options.maxRequestSize ?? securityConfig.maxRequestSize,
      type: ['application/json'],
    })
  );

  app.use('/', createRoutes(createControllers(store, options)));

  // 404 handler for unknown routes
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandlerMiddleware);

  return app;
}
