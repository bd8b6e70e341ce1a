import { Router } from 'express';
import type { PersonController } from '../controllers';
import { validationMiddleware } from '../middlewares';
import {
  idParamSchema,
  personCreateSchema,
  personQuerySchema,
  personUpdateSchema,
} from '../../schemas';

export function createPersonRoutes(personController: PersonController): Router {
  const router = Router();

  /**
   * POST /persons
   * Create a person under a freshly generated ID
   */
  router.post('/', validationMiddleware(personCreateSchema, 'body'), personController.createPerson);

  /**
   * GET /persons
   * List persons; city and country match against any embedded address
   */
  router.get('/', validationMiddleware(personQuerySchema, 'query'), personController.getPersons);

  /**
   * GET /persons/{id}
   */
  router.get('/:id', validationMiddleware(idParamSchema, 'params'), personController.getPersonById);

  /**
   * PATCH /persons/{id}
   * Partial update; omitted fields keep their stored value
   */
  router.patch(
    '/:id',
    validationMiddleware(idParamSchema, 'params'),
    validationMiddleware(personUpdateSchema, 'body'),
    personController.updatePerson
  );

  return router;
}
