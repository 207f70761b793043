import {
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { JobStatus } from '@/shared/jobs/enums/job-status.enum';

// Rows are written here once by the API; the scraper worker owns every
// status transition after QUEUED.
export const jobs = pgTable(
  'jobs',
  {
    id: uuid('id').primaryKey(),
    domain: text('domain').notNull(),
    urls: jsonb('urls').$type<string[]>().notNull(),
    status: text('status').$type<JobStatus>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    // Reconciliation scan: QUEUED jobs paged by (created_at, id)
    statusCreatedAtIdx: index('jobs_status_created_at_idx').on(
      table.status,
      table.createdAt,
      table.id,
    ),
  }),
);

export type JobRow = typeof jobs.$inferSelect;
