export const QUEUE_REGISTRY_CLIENT = Symbol('QUEUE_REGISTRY_CLIENT');

/**
 * The slice of a Redis client the queue registry needs.
 */
export interface QueueRegistryClient {
  hget(key: string, field: string): Promise<string | null>;
  hsetnx(key: string, field: string, value: string): Promise<number>;
  quit(): Promise<unknown>;
}
