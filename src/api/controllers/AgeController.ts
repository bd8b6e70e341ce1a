import type { NextFunction, Request, Response } from 'express';
import { BaseController } from './BaseController';
import type { AgeService } from '../../services/AgeService';
import { ageSchema, personNameParamSchema } from '../../schemas';

export class AgeController extends BaseController {
  constructor(private readonly ageService: AgeService) {
    super();
  }

  /**
   * POST /ages
   */
  createAge = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const age = await this.ageService.createAge(ageSchema.parse(req.body), traceId);
      this.created(res, age);
    });
  };

  /**
   * GET /ages
   */
  getAges = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      this.success(res, await this.ageService.getAges(traceId));
    });
  };

  /**
   * GET /ages/:personName
   */
  getAge = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { personName } = personNameParamSchema.parse(req.params);
      this.success(res, await this.ageService.getAge(personName, traceId));
    });
  };

  /**
   * PUT /ages/:personName
   */
  replaceAge = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { personName } = personNameParamSchema.parse(req.params);
      const age = await this.ageService.replaceAge(personName, ageSchema.parse(req.body), traceId);
      this.success(res, age);
    });
  };

  /**
   * DELETE /ages/:personName
   */
  deleteAge = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { personName } = personNameParamSchema.parse(req.params);
      await this.ageService.deleteAge(personName, traceId);
      this.noContent(res);
    });
  };
}
