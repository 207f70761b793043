import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';

export const PG_POOL = Symbol('PG_POOL');

export const pgPoolProvider: Provider = {
  provide: PG_POOL,
  inject: [ConfigService],
  useFactory: (configService: ConfigService) =>
    new Pool({
      connectionString: configService.getOrThrow<string>('DATABASE_URL'),
      max: configService.get<number>('DB_POOL_MAX') ?? 10,
    }),
};
