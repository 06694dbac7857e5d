import type { JobRecord, TaskRecord, RawEnvelope } from '../domain/index.js';
import type { ReconciliationErrorKind } from '../domain/index.js';
import type { JobPayload } from './analytics.js';

/**
 * Storage seams used by the reconciler and the aggregator.
 *
 * Adapters: Postgres (`infrastructure/db`) and in-memory
 * (`infrastructure/memory`). Both enforce the same per-job exclusion.
 */

export interface JobRepository {
  find(jobId: string): Promise<JobRecord | undefined>;
  /** Insert-or-replace the full record. */
  save(job: JobRecord): Promise<void>;
}

export type TaskRecordResult =
  | { readonly inserted: true }
  | { readonly inserted: false; readonly existing: TaskRecord };

/**
 * Append-only ledger of task outcomes. Uniqueness on (job_id, task_id) is
 * enforced here, independently of the idempotency ledger.
 */
export interface TaskLedger {
  record(task: TaskRecord): Promise<TaskRecordResult>;
  find(jobId: string, taskId: string): Promise<TaskRecord | undefined>;
  listForJob(jobId: string): Promise<TaskRecord[]>;
}

export interface IdempotencyLedger {
  hasBeenApplied(key: string): Promise<boolean>;
  markApplied(key: string): Promise<void>;
}

/** Everything a single reconciliation may read or write. */
export interface JobScope {
  readonly jobs: JobRepository;
  readonly tasks: TaskLedger;
  readonly idempotency: IdempotencyLedger;
}

export interface ReconciliationStore {
  /**
   * Runs `fn` holding the exclusive scope for `jobId`. Writes made through
   * the scope are committed only if `fn` resolves; a rejection discards them.
   */
  withJobScope<T>(jobId: string, fn: (scope: JobScope) => Promise<T>): Promise<T>;
}

/** Read-only view used by the aggregator. */
export interface AnalyticsReader {
  findJob(jobId: string): Promise<JobRecord | undefined>;
  listTasks(jobId: string): Promise<TaskRecord[]>;
  /** Jobs whose start_time lies in [from, to), ordered by start_time. */
  findJobsStartedBetween(from: Date, to: Date): Promise<JobRecord[]>;
}

// --------------------------------------------------
// Async execution boundary
// --------------------------------------------------

export interface TrackingHandle {
  readonly id: string;
}

export type FailureReason = ReconciliationErrorKind | 'InternalError';

export type FinalTrackingStatus =
  | { readonly state: 'succeeded'; readonly result: JobPayload }
  | { readonly state: 'failed'; readonly reason: FailureReason; readonly message: string };

export type TrackingStatus = { readonly state: 'pending' } | FinalTrackingStatus;

/**
 * Decouples submission from reconciliation: `submit` returns as soon as the
 * envelope is queued, `poll` reports the handle's state.
 */
export interface ExecutionBoundary {
  submit(envelope: RawEnvelope): Promise<TrackingHandle>;
  /** `null` for a handle this boundary never issued (or that expired). */
  poll(handleId: string): Promise<TrackingStatus | null>;
}
