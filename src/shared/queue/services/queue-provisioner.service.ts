import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DispatchError } from '@/shared/jobs/errors/job-admission.errors';
import { describeError, withDeadline } from '@/shared/lib/util';
import { QueueAlreadyExistsError, QueueNotFoundError } from '../errors/queue.errors';
import {
  QUEUE_SERVICE,
  QueueService,
} from '../interfaces/queue-service.interface';
import { DISPATCH_RETRY_POLICY, dispatchQueueName } from '../queue.constants';

/**
 * Makes sure a domain's dispatch queue exists before anything is enqueued
 * on it. Safe to call concurrently for the same domain.
 */
@Injectable()
export class QueueProvisionerService {
  private readonly logger = new Logger(QueueProvisionerService.name);
  private readonly prefix: string;
  private readonly timeoutMs: number;

  constructor(
    @Inject(QUEUE_SERVICE) private readonly queueService: QueueService,
    configService: ConfigService,
  ) {
    this.prefix = configService.get<string>('DISPATCH_QUEUE_PREFIX') ?? 'scrape-';
    this.timeoutMs = configService.get<number>('BOUNDARY_TIMEOUT_MS') ?? 10_000;
  }

  queueNameFor(domain: string): string {
    return dispatchQueueName(this.prefix, domain);
  }

  /**
   * Returns the queue name once the queue is known to exist.
   */
  async ensureQueue(domain: string): Promise<string> {
    const queueName = this.queueNameFor(domain);

    try {
      await withDeadline(
        this.queueService.getQueue(queueName),
        this.timeoutMs,
        `Lookup of queue ${queueName}`,
      );
      this.logger.debug(`Queue ${queueName} already exists`);
      return queueName;
    } catch (error) {
      // Permission, network or quota failures must not be read as "missing"
      if (!(error instanceof QueueNotFoundError)) {
        this.logger.error(
          `Failed to look up queue ${queueName}: ${describeError(error)}`,
        );
        throw new DispatchError(
          `Failed to look up the dispatch queue for domain ${domain}`,
          error,
        );
      }
    }

    this.logger.log(`Queue ${queueName} does not exist, creating it`);

    try {
      await withDeadline(
        this.queueService.createQueue(queueName, DISPATCH_RETRY_POLICY),
        this.timeoutMs,
        `Creation of queue ${queueName}`,
      );
      this.logger.log(`Created queue ${queueName}`);
    } catch (error) {
      if (error instanceof QueueAlreadyExistsError) {
        this.logger.debug(`Queue ${queueName} was created concurrently`);
        return queueName;
      }
      this.logger.error(
        `Failed to create queue ${queueName}: ${describeError(error)}`,
      );
      throw new DispatchError(
        `Failed to create the dispatch queue for domain ${domain}`,
        error,
      );
    }

    return queueName;
  }
}
