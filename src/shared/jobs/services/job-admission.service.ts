import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';
import { describeError, errorStack, withDeadline } from '@/shared/lib/util';
import { DispatchSubmitterService } from '@/shared/queue/services/dispatch-submitter.service';
import { QueueProvisionerService } from '@/shared/queue/services/queue-provisioner.service';
import { CreateJobDto } from '../dto/create-job.dto';
import { Job } from '../entities/job.entity';
import { JobStatus } from '../enums/job-status.enum';
import {
  DispatchError,
  PersistenceError,
  ValidationError,
} from '../errors/job-admission.errors';
import {
  JOB_RECORD_STORE,
  JobRecordStore,
} from '../interfaces/job-record-store.interface';

/**
 * Admits scrape jobs: records the job, provisions the domain's dispatch queue
 * and hands the job to the worker through it. A job whose dispatch cannot be
 * confirmed is deleted again before the failure is reported.
 *
 * Holds no per-call state; concurrent calls only meet in the record store and
 * the queue service.
 */
@Injectable()
export class JobAdmissionService {
  private readonly logger = new Logger(JobAdmissionService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(JOB_RECORD_STORE) private readonly store: JobRecordStore,
    private readonly provisioner: QueueProvisionerService,
    private readonly submitter: DispatchSubmitterService,
    configService: ConfigService,
  ) {
    this.timeoutMs = configService.get<number>('BOUNDARY_TIMEOUT_MS') ?? 10_000;
  }

  /**
   * Returns the new job id once the dispatch has been accepted by the queue.
   * Every call creates a new job; retrying is up to the caller.
   */
  async createJob(request: CreateJobDto): Promise<string> {
    const { domain, urls } = this.validate(request);

    const now = new Date();
    const job: Job = {
      id: uuidv4(),
      domain,
      urls: [...urls],
      status: JobStatus.QUEUED,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await withDeadline(
        this.store.put(job),
        this.timeoutMs,
        `Write of job ${job.id}`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to record job for domain ${domain}: ${describeError(error)}`,
        errorStack(error),
      );
      throw new PersistenceError(
        'Failed to create job. Service temporarily unavailable.',
        error,
      );
    }

    try {
      await this.provisioner.ensureQueue(domain);
      await this.submitter.submit(job.id, domain, job.urls);
    } catch (error) {
      const failure =
        error instanceof DispatchError
          ? error
          : new DispatchError(`Failed to dispatch job ${job.id}`, error);
      await this.compensate(job.id, failure);
      throw failure;
    }

    this.logger.log(`Created job ${job.id} for domain ${domain}`);
    return job.id;
  }

  /**
   * Read-through to the record store: the worker owns the status after
   * creation, so nothing is cached here.
   */
  async getJob(jobId: string): Promise<Job | null> {
    try {
      return await withDeadline(
        this.store.get(jobId),
        this.timeoutMs,
        `Read of job ${jobId}`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to retrieve job ${jobId}: ${describeError(error)}`,
        errorStack(error),
      );
      throw new PersistenceError('Failed to retrieve job.', error);
    }
  }

  private validate(request: CreateJobDto): CreateJobDto {
    const dto = plainToInstance(CreateJobDto, request);
    const errors = validateSync(dto);

    if (errors.length > 0) {
      const details = errors.flatMap((error) =>
        Object.values(error.constraints ?? {}),
      );
      this.logger.warn(`Rejected job request: ${details.join(', ')}`);
      throw new ValidationError(details);
    }

    return dto;
  }

  // Best effort: a failed delete is logged and the dispatch failure is still
  // what the caller sees.
  private async compensate(jobId: string, failure: DispatchError): Promise<void> {
    try {
      await withDeadline(
        this.store.delete(jobId),
        this.timeoutMs,
        `Delete of job ${jobId}`,
      );
      this.logger.warn(
        `Rolled back job ${jobId} after dispatch failure: ${failure.message}`,
      );
    } catch (cleanupError) {
      this.logger.warn(
        `Failed to clean up job ${jobId} after dispatch failure: ${describeError(cleanupError)}`,
      );
    }
  }
}
