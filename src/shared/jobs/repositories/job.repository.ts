import { Injectable, Logger } from '@nestjs/common';
import { and, asc, eq, gt, lt, or } from 'drizzle-orm';
import { DatabaseService } from '@/shared/database/database.service';
import { JobRow, jobs } from '@/shared/database/schema';
import { Job } from '../entities/job.entity';
import { JobStatus } from '../enums/job-status.enum';
import {
  JobRecordStore,
  StaleJobCursor,
} from '../interfaces/job-record-store.interface';

export function toJob(row: JobRow): Job {
  return {
    id: row.id,
    domain: row.domain,
    urls: row.urls,
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

@Injectable()
export class JobRepository implements JobRecordStore {
  private readonly logger = new Logger(JobRepository.name);

  constructor(private readonly database: DatabaseService) {}

  async put(job: Job): Promise<void> {
    await this.database.db.insert(jobs).values({
      id: job.id,
      domain: job.domain,
      urls: job.urls,
      status: job.status,
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
    });
  }

  async get(id: string): Promise<Job | null> {
    const rows = await this.database.db
      .select()
      .from(jobs)
      .where(eq(jobs.id, id))
      .limit(1);

    return rows.length > 0 ? toJob(rows[0]) : null;
  }

  async delete(id: string): Promise<void> {
    const removed = await this.database.db
      .delete(jobs)
      .where(eq(jobs.id, id))
      .returning({ id: jobs.id });

    if (removed.length === 0) {
      this.logger.debug(`Delete of job ${id} matched no row`);
    }
  }

  async findStale(
    status: JobStatus,
    olderThan: Date,
    limit: number,
    after?: StaleJobCursor,
  ): Promise<Job[]> {
    const rows = await this.database.db
      .select()
      .from(jobs)
      .where(
        and(
          eq(jobs.status, status),
          lt(jobs.createdAt, olderThan),
          after
            ? or(
                gt(jobs.createdAt, after.createdAt),
                and(eq(jobs.createdAt, after.createdAt), gt(jobs.id, after.id)),
              )
            : undefined,
        ),
      )
      .orderBy(asc(jobs.createdAt), asc(jobs.id))
      .limit(limit);

    return rows.map(toJob);
  }
}
