import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { QUEUE_REGISTRY_CLIENT } from './interfaces/queue-registry-client.interface';

/** Redis connection every dispatch queue shares. */
export const QUEUE_CONNECTION = Symbol('QUEUE_CONNECTION');

export const queueRegistryClientProvider: Provider = {
  provide: QUEUE_REGISTRY_CLIENT,
  inject: [ConfigService],
  useFactory: (configService: ConfigService) =>
    new Redis({
      host: configService.get<string>('REDIS_HOST') ?? 'localhost',
      port: configService.get<number>('REDIS_PORT') ?? 6379,
      maxRetriesPerRequest: 3,
    }),
};

// BullMQ reuses a client instance instead of opening one per queue.
export const queueConnectionProvider: Provider = {
  provide: QUEUE_CONNECTION,
  useExisting: QUEUE_REGISTRY_CLIENT,
};
