import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DispatchError } from '@/shared/jobs/errors/job-admission.errors';
import { describeError, withDeadline } from '@/shared/lib/util';
import { DispatchRequest } from '../interfaces/dispatch-request.interface';
import {
  QUEUE_SERVICE,
  QueueService,
} from '../interfaces/queue-service.interface';
import {
  DISPATCH_EXECUTION_TIMEOUT_SECONDS,
  DISPATCH_TASK_COUNT,
  dispatchQueueName,
} from '../queue.constants';

@Injectable()
export class DispatchSubmitterService {
  private readonly logger = new Logger(DispatchSubmitterService.name);
  private readonly prefix: string;
  private readonly targetUrl: string;
  private readonly invokerIdentity: string;
  private readonly timeoutMs: number;

  constructor(
    @Inject(QUEUE_SERVICE) private readonly queueService: QueueService,
    configService: ConfigService,
  ) {
    this.prefix = configService.get<string>('DISPATCH_QUEUE_PREFIX') ?? 'scrape-';
    this.targetUrl = configService.getOrThrow<string>('DISPATCH_TARGET_URL');
    this.invokerIdentity = configService.getOrThrow<string>(
      'DISPATCH_INVOKER_IDENTITY',
    );
    this.timeoutMs = configService.get<number>('BOUNDARY_TIMEOUT_MS') ?? 10_000;
  }

  /**
   * The worker receives the domain as its first argument and the URL list as
   * a JSON array, all URLs in a single invocation.
   */
  buildRequest(jobId: string, domain: string, urls: string[]): DispatchRequest {
    const args = [domain, '-a', `urls=${JSON.stringify(urls)}`];

    return {
      jobId,
      target: {
        method: 'POST',
        url: this.targetUrl,
        headers: { 'Content-Type': 'application/json' },
      },
      body: {
        overrides: {
          containerOverrides: [{ args }],
          taskCount: DISPATCH_TASK_COUNT,
          timeout: `${DISPATCH_EXECUTION_TIMEOUT_SECONDS}s`,
        },
      },
      identity: { serviceAccount: this.invokerIdentity },
      createdAt: new Date().toISOString(),
    };
  }

  async submit(jobId: string, domain: string, urls: string[]): Promise<void> {
    const queueName = dispatchQueueName(this.prefix, domain);
    const request = this.buildRequest(jobId, domain, urls);

    try {
      await withDeadline(
        this.queueService.enqueue(queueName, request),
        this.timeoutMs,
        `Dispatch of job ${jobId}`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to enqueue job ${jobId} on ${queueName}: ${describeError(error)}`,
      );
      throw new DispatchError(`Failed to dispatch job ${jobId}`, error);
    }

    this.logger.log(`Enqueued job ${jobId} on queue ${queueName}`);
  }
}
