import { DispatchRequest } from './dispatch-request.interface';

export const QUEUE_SERVICE = Symbol('QUEUE_SERVICE');

export interface RetryPolicy {
  maxAttempts: number;
  minBackoffMs: number;
  maxBackoffMs: number;
  maxRetryDurationMs: number;
}

export interface QueueMetadata {
  name: string;
  retryPolicy: RetryPolicy;
  createdAt: string;
}

/**
 * Managed at-least-once task queue, one named queue per tenant.
 *
 * `getQueue` and `enqueue` reject with QueueNotFoundError for a queue that
 * was never created; `createQueue` rejects with QueueAlreadyExistsError when
 * another caller created it first.
 */
export interface QueueService {
  getQueue(name: string): Promise<QueueMetadata>;
  createQueue(name: string, retryPolicy: RetryPolicy): Promise<QueueMetadata>;
  enqueue(name: string, request: DispatchRequest): Promise<string>;
  hasDispatch(name: string, jobId: string): Promise<boolean>;
}
