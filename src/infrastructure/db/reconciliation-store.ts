import { and, asc, eq, gte, lt, sql } from 'drizzle-orm';
import type { JobRecord, TaskRecord } from '../../domain/index.js';
import type {
  AnalyticsReader,
  JobScope,
  ReconciliationStore,
  TaskRecordResult,
} from '../../application/ports.js';
import type { Database, Executor } from './client.js';
import { idempotencyRecords, jobs, taskEvents } from './schema.js';
import { toStorageError } from './storage-errors.js';

type JobRow = typeof jobs.$inferSelect;
type TaskRow = typeof taskEvents.$inferSelect;

function toJobRecord(row: JobRow): JobRecord {
  return {
    job_id: row.job_id,
    user: row.user,
    start_time: row.start_time,
    end_time: row.end_time,
    result: row.result,
  };
}

function toTaskRecord(row: TaskRow): TaskRecord {
  return {
    job_id: row.job_id,
    task_id: row.task_id,
    duration_ms: row.duration_ms,
    successful: row.successful,
    observed_at: row.observed_at,
  };
}

async function findJob(db: Executor, jobId: string): Promise<JobRecord | undefined> {
  const rows = await db.select().from(jobs).where(eq(jobs.job_id, jobId)).limit(1);
  const row = rows[0];
  return row === undefined ? undefined : toJobRecord(row);
}

async function findTask(db: Executor, jobId: string, taskId: string): Promise<TaskRecord | undefined> {
  const rows = await db
    .select()
    .from(taskEvents)
    .where(and(eq(taskEvents.job_id, jobId), eq(taskEvents.task_id, taskId)))
    .limit(1);
  const row = rows[0];
  return row === undefined ? undefined : toTaskRecord(row);
}

async function listTasks(db: Executor, jobId: string): Promise<TaskRecord[]> {
  const rows = await db
    .select()
    .from(taskEvents)
    .where(eq(taskEvents.job_id, jobId))
    .orderBy(asc(taskEvents.task_id));
  return rows.map(toTaskRecord);
}

/** Binds the three ledgers to an open transaction. */
function createScope(tx: Executor): JobScope {
  return {
    jobs: {
      find: (jobId) => findJob(tx, jobId),
      save: async (job) => {
        await tx
          .insert(jobs)
          .values({
            job_id: job.job_id,
            user: job.user,
            start_time: job.start_time,
            end_time: job.end_time,
            result: job.result,
          })
          .onConflictDoUpdate({
            target: jobs.job_id,
            set: {
              user: job.user,
              start_time: job.start_time,
              end_time: job.end_time,
              result: job.result,
              updated_at: new Date(),
            },
          });
      },
    },

    tasks: {
      find: (jobId, taskId) => findTask(tx, jobId, taskId),
      listForJob: (jobId) => listTasks(tx, jobId),
      record: async (task): Promise<TaskRecordResult> => {
        const inserted = await tx
          .insert(taskEvents)
          .values({
            job_id: task.job_id,
            task_id: task.task_id,
            duration_ms: task.duration_ms,
            successful: task.successful,
            observed_at: task.observed_at,
          })
          .onConflictDoNothing({ target: [taskEvents.job_id, taskEvents.task_id] })
          .returning({ task_id: taskEvents.task_id });

        if (inserted.length > 0) return { inserted: true };

        const existing = await findTask(tx, task.job_id, task.task_id);
        if (existing === undefined) {
          throw new Error(`Task ${task.job_id}/${task.task_id} conflicted but could not be read back`);
        }
        return { inserted: false, existing };
      },
    },

    idempotency: {
      hasBeenApplied: async (key) => {
        const rows = await tx
          .select({ key: idempotencyRecords.key })
          .from(idempotencyRecords)
          .where(eq(idempotencyRecords.key, key))
          .limit(1);
        return rows.length > 0;
      },
      markApplied: async (key) => {
        await tx
          .insert(idempotencyRecords)
          .values({ key })
          .onConflictDoNothing({ target: idempotencyRecords.key });
      },
    },
  };
}

/**
 * Postgres-backed reconciliation store.
 *
 * Each scope is one transaction holding a transaction-scoped advisory lock
 * on the job id: concurrent workers serialize per job, never globally,
 * and the idempotency mark commits atomically with the merge.
 */
export class PostgresReconciliationStore implements ReconciliationStore, AnalyticsReader {
  constructor(private readonly db: Database) {}

  async withJobScope<T>(jobId: string, fn: (scope: JobScope) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtextextended(${jobId}, 0))`);
        return fn(createScope(tx));
      });
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }

  async findJob(jobId: string): Promise<JobRecord | undefined> {
    return this.read(() => findJob(this.db, jobId));
  }

  async listTasks(jobId: string): Promise<TaskRecord[]> {
    return this.read(() => listTasks(this.db, jobId));
  }

  /** Range predicate on the indexed `start_time` column, no full scan. */
  async findJobsStartedBetween(from: Date, to: Date): Promise<JobRecord[]> {
    return this.read(async () => {
      const rows = await this.db
        .select()
        .from(jobs)
        .where(and(gte(jobs.start_time, from), lt(jobs.start_time, to)))
        .orderBy(asc(jobs.start_time), asc(jobs.job_id));
      return rows.map(toJobRecord);
    });
  }

  private async read<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (err: unknown) {
      throw toStorageError(err);
    }
  }
}
