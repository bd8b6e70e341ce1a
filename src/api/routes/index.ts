import { Router, type Request, type Response } from 'express';
import type { Controllers } from '../controllers';
import { createAddressRoutes } from './addresses';
import { createAgeRoutes } from './ages';
import { createHealthRoutes } from './health';
import { createJobRoutes } from './jobs';
import { createPersonRoutes } from './persons';
import { getTraceId } from '../middlewares';
import { logger } from '../../utils/logger';
import configManager from '../../config/app';

export const WELCOME_MESSAGE =
  'Welcome to the Person/Address/Age/Job API. See /docs for the endpoint catalogue.';

export const ENDPOINT_CATALOGUE = {
  addresses: {
    create: 'POST /addresses',
    list: 'GET /addresses?street=&city=&state=&postal_code=&country=',
    get: 'GET /addresses/{id}',
    update: 'PATCH /addresses/{id}',
  },
  persons: {
    create: 'POST /persons',
    list: 'GET /persons?uni=&first_name=&last_name=&email=&phone=&birth_date=&city=&country=',
    get: 'GET /persons/{id}',
    update: 'PATCH /persons/{id}',
  },
  ages: {
    create: 'POST /ages',
    list: 'GET /ages',
    get: 'GET /ages/{person_name}',
    replace: 'PUT /ages/{person_name}',
    delete: 'DELETE /ages/{person_name}',
  },
  jobs: {
    create: 'POST /jobs',
    list: 'GET /jobs',
    get: 'GET /jobs/{id}',
    replace: 'PUT /jobs/{id}',
    delete: 'DELETE /jobs/{id}',
  },
  health: {
    basic: 'GET /health?echo=',
    withPathEcho: 'GET /health/{path_echo}?echo=',
  },
} as const;

export function createRoutes(controllers: Controllers): Router {
  const router = Router();

  /**
   * API welcome endpoint
   * GET /
   */
  router.get('/', (req: Request, res: Response) => {
    logger.info('API root endpoint accessed', { traceId: getTraceId(req) });

    res.json({
      message: WELCOME_MESSAGE,
      version: configManager.getPackageConfig().npmPackageVersion,
      endpoints: {
        addresses: '/addresses',
        persons: '/persons',
        ages: '/ages',
        jobs: '/jobs',
        health: '/health',
        documentation: '/docs',
      },
    });
  });

  /**
   * Endpoint catalogue
   * GET /docs
   */
  router.get('/docs', (req: Request, res: Response) => {
    res.json({
      message: 'API Documentation',
      endpoints: ENDPOINT_CATALOGUE,
    });
  });

  router.use('/health', createHealthRoutes(controllers.healthController));
  router.use('/addresses', createAddressRoutes(controllers.addressController));
  router.use('/persons', createPersonRoutes(controllers.personController));
  router.use('/ages', createAgeRoutes(controllers.ageController));
  router.use('/jobs', createJobRoutes(controllers.jobController));

  return router;
}
