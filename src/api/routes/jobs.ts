import { Router } from 'express';
import type { JobController } from '../controllers';
import { validationMiddleware } from '../middlewares';
import { jobSchema } from '../../schemas';

export function createJobRoutes(jobController: JobController): Router {
  const router = Router();

  /**
   * POST /jobs
   * Store a job under its ID (generated when absent), replacing any previous one
   */
  router.post('/', validationMiddleware(jobSchema, 'body'), jobController.createJob);

  /**
   * GET /jobs
   */
  router.get('/', jobController.getJobs);

  /**
   * GET /jobs/{id}
   */
  router.get('/:id', jobController.getJob);

  /**
   * PUT /jobs/{id}
   * Replace or create; the path ID must equal the payload's id
   */
  router.put('/:id', validationMiddleware(jobSchema, 'body'), jobController.replaceJob);

  /**
   * DELETE /jobs/{id}
   */
  router.delete('/:id', jobController.deleteJob);

  return router;
}
