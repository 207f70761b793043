import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { PG_POOL } from './database.providers';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  // Gateway to the jobs table
  public readonly db: Database;

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {
    this.pool.on('error', (error) => {
      this.logger.error(`Idle database client error: ${error.message}`);
    });

    this.db = drizzle(this.pool, { schema });
  }

  async onModuleDestroy(): Promise<void> {
    // Closes the connection pool when the app shuts down
    await this.pool.end();
  }
}
