import type { NextFunction, Request, Response } from 'express';
import { BaseController } from './BaseController';
import type { AddressService } from '../../services/AddressService';
import {
  addressCreateSchema,
  addressQuerySchema,
  addressUpdateSchema,
  idParamSchema,
} from '../../schemas';

/**
 * Controller for address endpoints
 */
export class AddressController extends BaseController {
  constructor(private readonly addressService: AddressService) {
    super();
  }

  /**
   * POST /addresses
   */
  createAddress = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const data = addressCreateSchema.parse(req.body);
      const address = await this.addressService.createAddress(data, traceId);
      this.created(res, address);
    });
  };

  /**
   * GET /addresses
   */
  getAddresses = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const filters = addressQuerySchema.parse(req.query);
      const addresses = await this.addressService.getAddresses(filters, traceId);
      this.success(res, addresses);
    });
  };

  /**
   * GET /addresses/:id
   */
  getAddressById = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = idParamSchema.parse(req.params);
      const address = await this.addressService.getAddressById(id, traceId);
      this.success(res, address);
    });
  };

  /**
   * PATCH /addresses/:id
   */
  updateAddress = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = idParamSchema.parse(req.params);
      const updates = addressUpdateSchema.parse(req.body);
      const address = await this.addressService.updateAddress(id, updates, traceId);
      this.success(res, address);
    });
  };
}
