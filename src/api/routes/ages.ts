import { Router } from 'express';
import type { AgeController } from '../controllers';
import { validationMiddleware } from '../middlewares';
import { ageSchema } from '../../schemas';

export function createAgeRoutes(ageController: AgeController): Router {
  const router = Router();

  /**
   * POST /ages
   * Store an age record under its person name, replacing any previous one
   */
  router.post('/', validationMiddleware(ageSchema, 'body'), ageController.createAge);

  /**
   * GET /ages
   */
  router.get('/', ageController.getAges);

  /**
   * GET /ages/{personName}
   */
  router.get('/:personName', ageController.getAge);

  /**
   * PUT /ages/{personName}
   * Replace or create; the path key must equal the payload's person_name
   */
  router.put('/:personName', validationMiddleware(ageSchema, 'body'), ageController.replaceAge);

  /**
   * DELETE /ages/{personName}
   */
  router.delete('/:personName', ageController.deleteAge);

  return router;
}
