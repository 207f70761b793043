import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Job } from '@/shared/jobs/entities/job.entity';
import { JobStatus } from '@/shared/jobs/enums/job-status.enum';
import {
  JOB_RECORD_STORE,
  JobRecordStore,
  StaleJobCursor,
} from '@/shared/jobs/interfaces/job-record-store.interface';
import { describeError, withDeadline } from '@/shared/lib/util';
import {
  QUEUE_SERVICE,
  QueueService,
} from '@/shared/queue/interfaces/queue-service.interface';
import { QueueProvisionerService } from '@/shared/queue/services/queue-provisioner.service';

export interface ReconcileSummary {
  scanned: number;
  removed: number;
  skipped: number;
  failed: number;
}

type ReconcileOutcome = 'removed' | 'skipped' | 'failed';

/**
 * Finishes compensation the admission saga could not complete. A stale QUEUED
 * record with no dispatch in its queue belongs to a create call that either
 * failed (and whose rollback failed too) or never returned, so no caller holds
 * its id: the record is deleted, never dispatched. Status is never written.
 */
@Injectable()
export class JobReconcilerService {
  private readonly logger = new Logger(JobReconcilerService.name);
  private readonly staleAfterMs: number;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private sweeping = false;

  constructor(
    @Inject(JOB_RECORD_STORE) private readonly store: JobRecordStore,
    @Inject(QUEUE_SERVICE) private readonly queueService: QueueService,
    private readonly provisioner: QueueProvisionerService,
    configService: ConfigService,
  ) {
    this.staleAfterMs =
      configService.get<number>('RECONCILE_STALE_AFTER_MS') ?? 900_000;
    this.batchSize = configService.get<number>('RECONCILE_BATCH_SIZE') ?? 100;
    this.timeoutMs = configService.get<number>('BOUNDARY_TIMEOUT_MS') ?? 10_000;
  }

  @Cron(CronExpression.EVERY_5_MINUTES)
  async handleCron(): Promise<void> {
    try {
      await this.sweep();
    } catch (error) {
      this.logger.error(`Reconciliation sweep failed: ${describeError(error)}`);
    }
  }

  /**
   * Walks every stale QUEUED job page by page, so jobs that are legitimately
   * waiting in their queue never hide the ones behind them.
   */
  async sweep(now: Date = new Date()): Promise<ReconcileSummary | null> {
    if (this.sweeping) {
      this.logger.debug('Previous sweep still running, skipping');
      return null;
    }

    this.sweeping = true;
    try {
      const cutoff = new Date(now.getTime() - this.staleAfterMs);
      const summary: ReconcileSummary = {
        scanned: 0,
        removed: 0,
        skipped: 0,
        failed: 0,
      };

      let after: StaleJobCursor | undefined;
      for (;;) {
        const page = await withDeadline(
          this.store.findStale(JobStatus.QUEUED, cutoff, this.batchSize, after),
          this.timeoutMs,
          'Scan of stale jobs',
        );

        // One job at a time
        for (const job of page) {
          summary.scanned += 1;
          summary[await this.reconcile(job)] += 1;
        }

        if (page.length < this.batchSize) {
          break;
        }
        const last = page[page.length - 1];
        after = { createdAt: last.createdAt, id: last.id };
      }

      if (summary.scanned > 0) {
        this.logger.log(
          `Reconciled ${summary.scanned} stale jobs: ${summary.removed} removed, ${summary.skipped} still queued, ${summary.failed} failed`,
        );
      }
      return summary;
    } finally {
      this.sweeping = false;
    }
  }

  private async reconcile(job: Job): Promise<ReconcileOutcome> {
    const queueName = this.provisioner.queueNameFor(job.domain);

    try {
      const dispatched = await withDeadline(
        this.queueService.hasDispatch(queueName, job.id),
        this.timeoutMs,
        `Dispatch lookup of job ${job.id}`,
      );
      if (dispatched) {
        return 'skipped';
      }

      await withDeadline(
        this.store.delete(job.id),
        this.timeoutMs,
        `Delete of job ${job.id}`,
      );
      this.logger.warn(
        `Removed job ${job.id}: no dispatch on ${queueName} after ${this.staleAfterMs}ms`,
      );
      return 'removed';
    } catch (error) {
      this.logger.warn(
        `Could not reconcile job ${job.id}: ${describeError(error)}`,
      );
      return 'failed';
    }
  }
}
