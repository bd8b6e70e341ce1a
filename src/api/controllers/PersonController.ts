import type { NextFunction, Request, Response } from 'express';
import { BaseController } from './BaseController';
import type { PersonService } from '../../services/PersonService';
import {
  idParamSchema,
  personCreateSchema,
  personQuerySchema,
  personUpdateSchema,
} from '../../schemas';

/**
 * Controller for person endpoints
 */
export class PersonController extends BaseController {
  constructor(private readonly personService: PersonService) {
    super();
  }

  /**
   * POST /persons
   */
  createPerson = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const data = personCreateSchema.parse(req.body);
      const person = await this.personService.createPerson(data, traceId);
      this.created(res, person);
    });
  };

  /**
   * GET /persons
   */
  getPersons = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const filters = personQuerySchema.parse(req.query);
      const persons = await this.personService.getPersons(filters, traceId);
      this.success(res, persons);
    });
  };

  /**
   * GET /persons/:id
   */
  getPersonById = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = idParamSchema.parse(req.params);
      const person = await this.personService.getPersonById(id, traceId);
      this.success(res, person);
    });
  };

  /**
   * PATCH /persons/:id
   */
  updatePerson = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = idParamSchema.parse(req.params);
      const updates = personUpdateSchema.parse(req.body);
      const person = await this.personService.updatePerson(id, updates, traceId);
      this.success(res, person);
    });
  };
}
