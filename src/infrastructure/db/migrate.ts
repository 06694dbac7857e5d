import type { SqlClient } from './client.js';

/**
 * Ensures tables exist (lightweight migration via raw SQL).
 *
 * Mirrors `schema.ts`. drizzle-kit can generate proper migrations from
 * the schema; this keeps a fresh database usable on first boot.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS jobs (
      job_id      VARCHAR(255) PRIMARY KEY,
      user_name   VARCHAR(255),
      start_time  TIMESTAMPTZ,
      end_time    TIMESTAMPTZ,
      result      VARCHAR(16)  NOT NULL DEFAULT 'Unknown',
      updated_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS task_events (
      job_id       VARCHAR(255) NOT NULL,
      task_id      VARCHAR(255) NOT NULL,
      duration_ms  INTEGER      NOT NULL,
      successful   BOOLEAN      NOT NULL,
      observed_at  TIMESTAMPTZ  NOT NULL,
      recorded_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      PRIMARY KEY (job_id, task_id)
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS idempotency_records (
      key         TEXT         PRIMARY KEY,
      applied_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  // Widens keys of databases created with VARCHAR(600).
  await sql.unsafe(`ALTER TABLE idempotency_records ALTER COLUMN key TYPE TEXT`);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_jobs_start_time ON jobs (start_time)`);
}
