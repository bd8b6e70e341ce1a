/**
 * Business logic service for jobs
 * Create and replace are upserts keyed by the string form of the job ID
 */

import type { JobRepository } from '../repositories/JobRepository';
import type { IJob } from '../types';
import { NotFoundError, ValidationError } from '../utils/error';
import { logger } from '../utils/logger';

export class JobService {
  constructor(private readonly jobRepository: JobRepository) {}

  public async createJob(job: IJob, traceId: string): Promise<IJob> {
    const replaced = this.jobRepository.exists(String(job.id));
    const saved = await this.jobRepository.save(job, traceId);

    logger.withTrace(traceId).info('Job stored', { id: saved.id, replaced });
    return saved;
  }

  public async getJobs(traceId: string): Promise<IJob[]> {
    return this.jobRepository.findAll({}, traceId);
  }

  public async getJob(id: string, traceId: string): Promise<IJob> {
    const job = await this.jobRepository.findByKey(id, traceId);

    if (!job) {
      logger.withTrace(traceId).warn('Job not found', { id });
      throw new NotFoundError('Job');
    }

    return job;
  }

  public async replaceJob(id: string, job: IJob, traceId: string): Promise<IJob> {
    if (String(job.id) !== id) {
      logger.withTrace(traceId).warn('Job key mismatch', { pathKey: id, payloadKey: job.id });
      throw new ValidationError('Job ID in URL must match payload');
    }

    return this.createJob(job, traceId);
  }

  public async deleteJob(id: string, traceId: string): Promise<void> {
    const deleted = await this.jobRepository.delete(id, traceId);

    if (!deleted) {
      logger.withTrace(traceId).warn('Job not found', { id });
      throw new NotFoundError('Job');
    }

    logger.withTrace(traceId).info('Job deleted', { id });
  }
}
