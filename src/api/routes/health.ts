import { Router } from 'express';
import type { HealthController } from '../controllers';
import { validationMiddleware } from '../middlewares';
import { healthQuerySchema } from '../../schemas';

export function createHealthRoutes(healthController: HealthController): Router {
  const router = Router();

  /**
   * GET /health
   * Health check with an optional ?echo= value
   */
  router.get('/', validationMiddleware(healthQuerySchema, 'query'), healthController.healthCheck);

  /**
   * GET /health/{pathEcho}
   * Same check, also echoing a path segment
   */
  router.get(
    '/:pathEcho',
    validationMiddleware(healthQuerySchema, 'query'),
    healthController.healthCheck
  );

  return router;
}
