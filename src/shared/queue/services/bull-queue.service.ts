import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConnectionOptions, JobsOptions, Queue } from 'bullmq';
import { describeError } from '@/shared/lib/util';
import {
  QueueAlreadyExistsError,
  QueueNotFoundError,
  UnsupportedRetryPolicyError,
} from '../errors/queue.errors';
import { DispatchRequest } from '../interfaces/dispatch-request.interface';
import {
  QUEUE_REGISTRY_CLIENT,
  QueueRegistryClient,
} from '../interfaces/queue-registry-client.interface';
import {
  QueueMetadata,
  QueueService,
  RetryPolicy,
} from '../interfaces/queue-service.interface';
import {
  DISPATCH_JOB_NAME,
  QUEUE_CONFIG,
  QUEUE_REGISTRY_KEY,
} from '../queue.constants';
import { QUEUE_CONNECTION } from '../queue.providers';

function isRetryPolicy(value: unknown): value is RetryPolicy {
  return (
    typeof value === 'object' &&
    value !== null &&
    'maxAttempts' in value &&
    typeof value.maxAttempts === 'number' &&
    'minBackoffMs' in value &&
    typeof value.minBackoffMs === 'number' &&
    'maxBackoffMs' in value &&
    typeof value.maxBackoffMs === 'number' &&
    'maxRetryDurationMs' in value &&
    typeof value.maxRetryDurationMs === 'number'
  );
}

export function parseQueueMetadata(raw: string): QueueMetadata {
  const entry: unknown = JSON.parse(raw);
  if (
    typeof entry === 'object' &&
    entry !== null &&
    'name' in entry &&
    typeof entry.name === 'string' &&
    'createdAt' in entry &&
    typeof entry.createdAt === 'string' &&
    'retryPolicy' in entry &&
    isRetryPolicy(entry.retryPolicy)
  ) {
    return {
      name: entry.name,
      createdAt: entry.createdAt,
      retryPolicy: entry.retryPolicy,
    };
  }
  throw new Error('Malformed queue registry entry');
}

/**
 * Waits BullMQ's exponential backoff puts between attempts: `minBackoffMs`
 * doubled after every retry.
 */
export function retryDelaysMs(
  policy: Pick<RetryPolicy, 'maxAttempts' | 'minBackoffMs'>,
): number[] {
  return Array.from(
    { length: Math.max(policy.maxAttempts - 1, 0) },
    (_, retry) => policy.minBackoffMs * 2 ** retry,
  );
}

/**
 * BullMQ has no backoff or total-duration ceiling of its own, so a policy is
 * only accepted when its whole schedule already fits inside both.
 */
export function assertRetryPolicySupported(
  queueName: string,
  policy: RetryPolicy,
): void {
  const delays = retryDelaysMs(policy);
  const longest = delays.length > 0 ? delays[delays.length - 1] : 0;
  const total = delays.reduce((sum, delay) => sum + delay, 0);

  if (longest > policy.maxBackoffMs) {
    throw new UnsupportedRetryPolicyError(
      queueName,
      `longest backoff ${longest}ms exceeds ${policy.maxBackoffMs}ms`,
    );
  }
  if (total > policy.maxRetryDurationMs) {
    throw new UnsupportedRetryPolicyError(
      queueName,
      `retries span ${total}ms, more than ${policy.maxRetryDurationMs}ms`,
    );
  }
}

export function toJobsOptions(
  policy: Pick<RetryPolicy, 'maxAttempts' | 'minBackoffMs'>,
  jobId: string,
): JobsOptions {
  return {
    jobId,
    attempts: policy.maxAttempts,
    backoff: {
      type: 'exponential',
      delay: policy.minBackoffMs,
    },
    ...QUEUE_CONFIG,
  };
}

/**
 * Dispatch queues on BullMQ. BullMQ creates queues implicitly, so the set of
 * provisioned queues and their retry policies live in a Redis hash; HSETNX
 * makes creation atomic across API instances. All queues share one Redis
 * connection, however many domains are seen.
 */
@Injectable()
export class BullQueueService implements QueueService, OnModuleDestroy {
  private readonly logger = new Logger(BullQueueService.name);
  private readonly queues = new Map<string, Queue<DispatchRequest>>();

  constructor(
    @Inject(QUEUE_REGISTRY_CLIENT)
    private readonly registry: QueueRegistryClient,
    @Inject(QUEUE_CONNECTION) private readonly connection: ConnectionOptions,
  ) {}

  async getQueue(name: string): Promise<QueueMetadata> {
    const raw = await this.registry.hget(QUEUE_REGISTRY_KEY, name);
    if (raw === null) {
      throw new QueueNotFoundError(name);
    }
    return parseQueueMetadata(raw);
  }

  async createQueue(
    name: string,
    retryPolicy: RetryPolicy,
  ): Promise<QueueMetadata> {
    assertRetryPolicySupported(name, retryPolicy);

    const metadata: QueueMetadata = {
      name,
      retryPolicy,
      createdAt: new Date().toISOString(),
    };

    const created = await this.registry.hsetnx(
      QUEUE_REGISTRY_KEY,
      name,
      JSON.stringify(metadata),
    );
    if (created === 0) {
      throw new QueueAlreadyExistsError(name);
    }

    return metadata;
  }

  async enqueue(name: string, request: DispatchRequest): Promise<string> {
    const { retryPolicy } = await this.getQueue(name);

    const job = await this.open(name).add(
      DISPATCH_JOB_NAME,
      request,
      toJobsOptions(retryPolicy, request.jobId),
    );

    if (!job.id) {
      throw new Error(`Queue ${name} did not assign an id to the dispatch`);
    }
    return job.id;
  }

  async hasDispatch(name: string, jobId: string): Promise<boolean> {
    const job = await this.open(name).getJob(jobId);
    return Boolean(job);
  }

  async onModuleDestroy(): Promise<void> {
    const results = await Promise.allSettled(
      [...this.queues.values()].map((queue) => queue.close()),
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(
          `Failed to close dispatch queue: ${describeError(result.reason)}`,
        );
      }
    }
    this.queues.clear();
    // Closing a queue leaves a shared connection open
    await this.registry.quit();
  }

  private open(name: string): Queue<DispatchRequest> {
    let queue = this.queues.get(name);
    if (!queue) {
      queue = new Queue<DispatchRequest>(name, { connection: this.connection });
      this.queues.set(name, queue);
    }
    return queue;
  }
}
