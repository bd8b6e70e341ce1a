/**
 * Job repository implementation, keyed by the string form of the job ID
 */

import { BaseRepository } from '../core/BaseRepository';
import type { IJob } from '../types';

export class JobRepository extends BaseRepository<IJob> {
  constructor() {
    super('Job');
  }

  protected keyOf(job: IJob): string {
    return String(job.id);
  }

  protected matches(): boolean {
    return true;
  }
}
