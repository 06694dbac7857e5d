export type JobResult = 'Unknown' | 'Succeeded' | 'Failed';

/**
 * Accumulated state for one upstream job.
 *
 * A record exists as soon as any event for `job_id` has been reconciled;
 * fields stay `null` until the event that carries them has been merged.
 */
export interface JobRecord {
  readonly job_id: string;
  readonly user: string | null;
  readonly start_time: Date | null;
  readonly end_time: Date | null;
  readonly result: JobResult;
}

/** One task outcome. At most one per (job_id, task_id). */
export interface TaskRecord {
  readonly job_id: string;
  readonly task_id: string;
  readonly duration_ms: number;
  readonly successful: boolean;
  /** Carried by the event, display only. */
  readonly observed_at: Date;
}

export type JobStatus = 'pending' | 'running' | 'success' | 'failure';

/** Status is never stored; it follows from `result` and the observed instants. */
export function deriveJobStatus(job: JobRecord): JobStatus {
  if (job.end_time !== null) {
    return job.result === 'Succeeded' ? 'success' : 'failure';
  }
  return job.start_time !== null ? 'running' : 'pending';
}

/**
 * Informational outcomes of a merge. Neither is an error: duplicates are
 * absorbed, conflicts are resolved deterministically and surfaced for logging.
 */
export type MergeNotice =
  | {
      readonly kind: 'DuplicateEvent';
      readonly job_id: string;
      readonly task_id?: string;
      readonly detail: string;
    }
  | {
      readonly kind: 'ConflictingMergeAnomaly';
      readonly job_id: string;
      readonly task_id?: string;
      readonly field: string;
      readonly kept: string;
      readonly discarded: string;
    };
