import {
  pgTable,
  varchar,
  text,
  integer,
  boolean,
  timestamp,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import type { JobResult } from '../../domain/index.js';

/**
 * Drizzle schema for the `jobs` table.
 *
 * One row per upstream job, created by whichever event arrives first.
 * `start_time` is indexed: daily summaries are a range scan over it.
 * The user column is `user_name` because `user` is reserved in Postgres.
 */
export const jobs = pgTable('jobs', {
  job_id: varchar('job_id', { length: 255 }).primaryKey(),
  user: varchar('user_name', { length: 255 }),
  start_time: timestamp('start_time', { withTimezone: true }),
  end_time: timestamp('end_time', { withTimezone: true }),
  result: varchar('result', { length: 16 }).$type<JobResult>().notNull().default('Unknown'),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_jobs_start_time').on(table.start_time),
]);

/**
 * Drizzle schema for the `task_events` table (the task ledger).
 *
 * The composite primary key is what guarantees a task is counted once.
 * `job_id` is deliberately not a foreign key: tasks may arrive first.
 */
export const taskEvents = pgTable('task_events', {
  job_id: varchar('job_id', { length: 255 }).notNull(),
  task_id: varchar('task_id', { length: 255 }).notNull(),
  // INTEGER: the classifier caps duration_ms at MAX_DURATION_MS.
  duration_ms: integer('duration_ms').notNull(),
  successful: boolean('successful').notNull(),
  observed_at: timestamp('observed_at', { withTimezone: true }).notNull(),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.job_id, table.task_id] }),
]);

/**
 * Keys of events already applied. Insert-only, never expired.
 * `key` is unbounded: job, task and event ids may each be 255 characters.
 */
export const idempotencyRecords = pgTable('idempotency_records', {
  key: text('key').primaryKey(),
  applied_at: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});
