import { RetryPolicy } from './interfaces/queue-service.interface';

export const QUEUE_REGISTRY_KEY = 'dispatch:queues';

export const DISPATCH_JOB_NAME = 'run-scraper';

/**
 * Retry policy every dispatch queue is created with.
 */
export const DISPATCH_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 7,
  minBackoffMs: 1_000,
  maxBackoffMs: 10 * 60_000,
  maxRetryDurationMs: 60 * 60_000,
};

/**
 * One worker invocation per dispatch, the whole URL list in one unit.
 */
export const DISPATCH_TASK_COUNT = 1;

export const DISPATCH_EXECUTION_TIMEOUT_SECONDS = 3600;

// Finished dispatches stay in Redis so the reconciler can tell a job that was
// dispatched from one that never was.
export const QUEUE_CONFIG = {
  removeOnComplete: false,
  removeOnFail: false,
};

export function dispatchQueueName(prefix: string, domain: string): string {
  return `${prefix}${domain}`;
}
