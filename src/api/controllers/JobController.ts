import type { NextFunction, Request, Response } from 'express';
import { BaseController } from './BaseController';
import type { JobService } from '../../services/JobService';
import { jobIdParamSchema, jobSchema } from '../../schemas';

export class JobController extends BaseController {
  constructor(private readonly jobService: JobService) {
    super();
  }

  /**
   * POST /jobs
   */
  createJob = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const job = await this.jobService.createJob(jobSchema.parse(req.body), traceId);
      this.created(res, job);
    });
  };

  /**
   * GET /jobs
   */
  getJobs = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      this.success(res, await this.jobService.getJobs(traceId));
    });
  };

  /**
   * GET /jobs/:id
   */
  getJob = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = jobIdParamSchema.parse(req.params);
      this.success(res, await this.jobService.getJob(id, traceId));
    });
  };

  /**
   * PUT /jobs/:id
   */
  replaceJob = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = jobIdParamSchema.parse(req.params);
      const job = await this.jobService.replaceJob(id, jobSchema.parse(req.body), traceId);
      this.success(res, job);
    });
  };

  /**
   * DELETE /jobs/:id
   */
  deleteJob = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await this.executeWithErrorHandling(req, next, async traceId => {
      const { id } = jobIdParamSchema.parse(req.params);
      await this.jobService.deleteJob(id, traceId);
      this.noContent(res);
    });
  };
}
