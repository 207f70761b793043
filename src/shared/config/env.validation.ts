import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Shared
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().default(6379),
  DATABASE_URL: Joi.string()
    .uri({ scheme: ['postgres', 'postgresql'] })
    .required(),
  DB_POOL_MAX: Joi.number().min(1).max(100).default(10),

  // API
  API_PORT: Joi.number().default(3000),

  // Dispatch
  DISPATCH_QUEUE_PREFIX: Joi.string()
    .pattern(/^[a-z0-9-]+$/i)
    .default('scrape-'),
  DISPATCH_TARGET_URL: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .required(),
  DISPATCH_INVOKER_IDENTITY: Joi.string().required(),
  BOUNDARY_TIMEOUT_MS: Joi.number().min(100).max(120_000).default(10_000),

  // Reconciler
  RECONCILE_STALE_AFTER_MS: Joi.number().min(60_000).default(900_000),
  RECONCILE_BATCH_SIZE: Joi.number().min(1).max(1000).default(100),
});
