import { ConnectionOptions, Queue } from 'bullmq';
import {
  QueueAlreadyExistsError,
  QueueNotFoundError,
  UnsupportedRetryPolicyError,
} from '../errors/queue.errors';
import { DispatchRequest } from '../interfaces/dispatch-request.interface';
import { QueueRegistryClient } from '../interfaces/queue-registry-client.interface';
import { DISPATCH_RETRY_POLICY, QUEUE_REGISTRY_KEY } from '../queue.constants';
import {
  BullQueueService,
  parseQueueMetadata,
  retryDelaysMs,
} from './bull-queue.service';

const mockAdd = jest.fn();
const mockGetJob = jest.fn();
const mockClose = jest.fn();

jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation(() => ({
    add: mockAdd,
    getJob: mockGetJob,
    close: mockClose,
  })),
}));

class FakeRegistry implements QueueRegistryClient {
  readonly hashes = new Map<string, Map<string, string>>();
  quitCalls = 0;

  async hget(key: string, field: string): Promise<string | null> {
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async hsetnx(key: string, field: string, value: string): Promise<number> {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    if (hash.has(field)) {
      return 0;
    }
    hash.set(field, value);
    return 1;
  }

  async quit(): Promise<string> {
    this.quitCalls += 1;
    return 'OK';
  }
}

function dispatchRequest(jobId: string): DispatchRequest {
  return {
    jobId,
    target: {
      method: 'POST',
      url: 'https://worker.test/run',
      headers: { 'Content-Type': 'application/json' },
    },
    body: {
      overrides: {
        containerOverrides: [
          { args: ['shop.example', '-a', 'urls=["https://shop.example/a"]'] },
        ],
        taskCount: 1,
        timeout: '3600s',
      },
    },
    identity: { serviceAccount: 'test-invoker' },
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('BullQueueService', () => {
  const QueueMock = jest.mocked(Queue);
  const connection: ConnectionOptions = { host: 'redis.test', port: 6379 };
  let registry: FakeRegistry;
  let service: BullQueueService;

  beforeEach(() => {
    jest.clearAllMocks();
    registry = new FakeRegistry();
    service = new BullQueueService(registry, connection);
  });

  describe('queue registry', () => {
    it('reports an unknown queue as not found', async () => {
      await expect(service.getQueue('scrape-shop.example')).rejects.toBeInstanceOf(
        QueueNotFoundError,
      );
    });

    it('returns the metadata of a created queue', async () => {
      const created = await service.createQueue(
        'scrape-shop.example',
        DISPATCH_RETRY_POLICY,
      );

      await expect(service.getQueue('scrape-shop.example')).resolves.toEqual(
        created,
      );
      expect(created.retryPolicy).toEqual(DISPATCH_RETRY_POLICY);
    });

    it('refuses to create the same queue twice', async () => {
      await service.createQueue('scrape-shop.example', DISPATCH_RETRY_POLICY);

      await expect(
        service.createQueue('scrape-shop.example', DISPATCH_RETRY_POLICY),
      ).rejects.toBeInstanceOf(QueueAlreadyExistsError);
    });

    it('refuses a policy whose backoff outgrows its ceiling', async () => {
      await expect(
        service.createQueue('scrape-shop.example', {
          ...DISPATCH_RETRY_POLICY,
          maxBackoffMs: 16_000,
        }),
      ).rejects.toThrow(
        new UnsupportedRetryPolicyError(
          'scrape-shop.example',
          'longest backoff 32000ms exceeds 16000ms',
        ).message,
      );
      await expect(service.getQueue('scrape-shop.example')).rejects.toBeInstanceOf(
        QueueNotFoundError,
      );
    });

    it('refuses a policy whose retries outlast its window', async () => {
      await expect(
        service.createQueue('scrape-shop.example', {
          ...DISPATCH_RETRY_POLICY,
          maxRetryDurationMs: 60_000,
        }),
      ).rejects.toThrow(
        'Retry policy for queue scrape-shop.example cannot be honoured: retries span 63000ms, more than 60000ms',
      );
    });

    it('rejects a malformed registry entry', async () => {
      await registry.hsetnx(QUEUE_REGISTRY_KEY, 'scrape-shop.example', '{"name":1}');

      await expect(service.getQueue('scrape-shop.example')).rejects.toThrow(
        'Malformed queue registry entry',
      );
    });
  });

  describe('enqueue', () => {
    it('does not touch BullMQ for a queue that was never provisioned', async () => {
      await expect(
        service.enqueue('scrape-shop.example', dispatchRequest('job-1')),
      ).rejects.toBeInstanceOf(QueueNotFoundError);
      expect(QueueMock).not.toHaveBeenCalled();
    });

    it('adds the dispatch under the job id with the queue retry policy', async () => {
      await service.createQueue('scrape-shop.example', DISPATCH_RETRY_POLICY);
      mockAdd.mockResolvedValue({ id: 'job-1' });
      const request = dispatchRequest('job-1');

      await expect(service.enqueue('scrape-shop.example', request)).resolves.toBe(
        'job-1',
      );

      expect(QueueMock).toHaveBeenCalledWith('scrape-shop.example', {
        connection,
      });
      expect(mockAdd).toHaveBeenCalledWith('run-scraper', request, {
        jobId: 'job-1',
        attempts: 7,
        backoff: { type: 'exponential', delay: 1_000 },
        removeOnComplete: false,
        removeOnFail: false,
      });
    });

    it('reuses the queue handle across dispatches', async () => {
      await service.createQueue('scrape-shop.example', DISPATCH_RETRY_POLICY);
      mockAdd.mockResolvedValueOnce({ id: 'job-1' });
      mockAdd.mockResolvedValueOnce({ id: 'job-2' });

      await service.enqueue('scrape-shop.example', dispatchRequest('job-1'));
      await service.enqueue('scrape-shop.example', dispatchRequest('job-2'));

      expect(QueueMock).toHaveBeenCalledTimes(1);
    });

    it('fails when BullMQ assigns no id', async () => {
      await service.createQueue('scrape-shop.example', DISPATCH_RETRY_POLICY);
      mockAdd.mockResolvedValue({ id: undefined });

      await expect(
        service.enqueue('scrape-shop.example', dispatchRequest('job-1')),
      ).rejects.toThrow('Queue scrape-shop.example did not assign an id to the dispatch');
    });
  });

  describe('hasDispatch', () => {
    it('is false when the queue holds no job with that id', async () => {
      mockGetJob.mockResolvedValue(undefined);

      await expect(service.hasDispatch('scrape-shop.example', 'job-1')).resolves.toBe(
        false,
      );
      expect(mockGetJob).toHaveBeenCalledWith('job-1');
    });

    it('is true when the job is in the queue', async () => {
      mockGetJob.mockResolvedValue({ id: 'job-1' });

      await expect(service.hasDispatch('scrape-shop.example', 'job-1')).resolves.toBe(
        true,
      );
    });
  });

  it('opens every domain queue on the one shared connection', async () => {
    mockGetJob.mockResolvedValue(undefined);

    await service.hasDispatch('scrape-a.example', 'job-1');
    await service.hasDispatch('scrape-b.example', 'job-2');
    await service.hasDispatch('scrape-c.example', 'job-3');

    expect(QueueMock).toHaveBeenCalledTimes(3);
    for (const [, options] of QueueMock.mock.calls) {
      expect(options?.connection).toBe(connection);
    }
  });

  it('closes open queues and the registry client on shutdown', async () => {
    mockGetJob.mockResolvedValue(undefined);
    mockClose.mockResolvedValue(undefined);
    await service.hasDispatch('scrape-a.example', 'job-1');
    await service.hasDispatch('scrape-b.example', 'job-2');

    await service.onModuleDestroy();

    expect(mockClose).toHaveBeenCalledTimes(2);
    expect(registry.quitCalls).toBe(1);
  });
});

describe('retryDelaysMs', () => {
  it('doubles the wait after every retry', () => {
    expect(retryDelaysMs(DISPATCH_RETRY_POLICY)).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000, 32_000,
    ]);
  });

  it('has no waits for a single attempt', () => {
    expect(retryDelaysMs({ maxAttempts: 1, minBackoffMs: 1_000 })).toEqual([]);
  });
});

describe('parseQueueMetadata', () => {
  it('reads a registry entry', () => {
    const entry = {
      name: 'scrape-shop.example',
      retryPolicy: DISPATCH_RETRY_POLICY,
      createdAt: '2026-01-01T00:00:00.000Z',
    };

    expect(parseQueueMetadata(JSON.stringify(entry))).toEqual(entry);
  });
});
