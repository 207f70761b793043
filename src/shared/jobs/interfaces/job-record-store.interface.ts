import { Job } from '../entities/job.entity';
import { JobStatus } from '../enums/job-status.enum';

export const JOB_RECORD_STORE = Symbol('JOB_RECORD_STORE');

/** Position in a stale scan: the last job of the previous page. */
export interface StaleJobCursor {
  createdAt: Date;
  id: string;
}

export interface JobRecordStore {
  put(job: Job): Promise<void>;
  get(id: string): Promise<Job | null>;
  delete(id: string): Promise<void>;

  /**
   * Jobs in `status` created before `olderThan`, ordered by `(createdAt, id)`
   * and starting after `after` when given. Only the reconciliation sweep
   * scans; admission never does.
   */
  findStale(
    status: JobStatus,
    olderThan: Date,
    limit: number,
    after?: StaleJobCursor,
  ): Promise<Job[]>;
}
