import { Router } from 'express';
import type { AddressController } from '../controllers';
import { validationMiddleware } from '../middlewares';
import {
  addressCreateSchema,
  addressQuerySchema,
  addressUpdateSchema,
  idParamSchema,
} from '../../schemas';

export function createAddressRoutes(addressController: AddressController): Router {
  const router = Router();

  /**
   * POST /addresses
   * Create an address; an ID that already exists is rejected
   *
   * Middleware chain:
   * 1. Body validation - Validate the full address
   * 2. Controller - Conflict check and store
   */
  router.post(
    '/',
    validationMiddleware(addressCreateSchema, 'body'),
    addressController.createAddress
  );

  /**
   * GET /addresses
   * List addresses; every provided filter must match
   */
  router.get('/', validationMiddleware(addressQuerySchema, 'query'), addressController.getAddresses);

  /**
   * GET /addresses/{id}
   */
  router.get(
    '/:id',
    validationMiddleware(idParamSchema, 'params'),
    addressController.getAddressById
  );

  /**
   * PATCH /addresses/{id}
   * Partial update; omitted fields keep their stored value
   *
   * Middleware chain:
   * 1. Param validation - Validate address ID format
   * 2. Body validation - Validate the provided fields
   * 3. Controller - Merge, re-validate and store
   */
  router.patch(
    '/:id',
    validationMiddleware(idParamSchema, 'params'),
    validationMiddleware(addressUpdateSchema, 'body'),
    addressController.updateAddress
  );

  return router;
}
