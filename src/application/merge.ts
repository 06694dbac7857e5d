import type {
  JobEndEvent,
  JobRecord,
  JobStartEvent,
  MergeNotice,
  TaskEndEvent,
  TaskRecord,
} from '../domain/index.js';

/**
 * Pure merge rules. No I/O: given the prior state (or none) and one event,
 * return the next state.
 *
 * Conflicting values are resolved by the earlier event instant. Only when
 * the instants are equal does application order decide, and that case is
 * reported as a `ConflictingMergeAnomaly`.
 */

export interface MergeResult<T> {
  readonly next: T;
  /** Whether `next` differs from the stored state and must be written. */
  readonly changed: boolean;
  readonly notices: readonly MergeNotice[];
}

export function emptyJob(jobId: string): JobRecord {
  return {
    job_id: jobId,
    user: null,
    start_time: null,
    end_time: null,
    result: 'Unknown',
  };
}

export function mergeJobStart(
  current: JobRecord | undefined,
  event: JobStartEvent,
): MergeResult<JobRecord> {
  const base = current ?? emptyJob(event.job_id);
  const created = current === undefined;

  if (base.start_time === null || event.timestamp.getTime() < base.start_time.getTime()) {
    return {
      next: { ...base, start_time: event.timestamp, user: event.user },
      changed: true,
      notices: [],
    };
  }

  if (event.timestamp.getTime() > base.start_time.getTime()) {
    return { next: base, changed: created, notices: [] };
  }

  const notice: MergeNotice = base.user === event.user
    ? { kind: 'DuplicateEvent', job_id: base.job_id, detail: 'job start already recorded' }
    : {
        kind: 'ConflictingMergeAnomaly',
        job_id: base.job_id,
        field: 'user',
        kept: String(base.user),
        discarded: event.user,
      };

  return { next: base, changed: created, notices: [notice] };
}

export function mergeJobEnd(
  current: JobRecord | undefined,
  event: JobEndEvent,
): MergeResult<JobRecord> {
  const base = current ?? emptyJob(event.job_id);
  const created = current === undefined;

  if (
    base.end_time === null
    || base.result === 'Unknown'
    || event.completion_time.getTime() < base.end_time.getTime()
  ) {
    return {
      next: { ...base, end_time: event.completion_time, result: event.result },
      changed: true,
      notices: [],
    };
  }

  if (event.completion_time.getTime() > base.end_time.getTime()) {
    return { next: base, changed: created, notices: [] };
  }

  const notice: MergeNotice = base.result === event.result
    ? { kind: 'DuplicateEvent', job_id: base.job_id, detail: 'job end already recorded' }
    : {
        kind: 'ConflictingMergeAnomaly',
        job_id: base.job_id,
        field: 'result',
        kept: base.result,
        discarded: event.result,
      };

  return { next: base, changed: created, notices: [notice] };
}

export function taskFromEvent(event: TaskEndEvent): TaskRecord {
  return {
    job_id: event.job_id,
    task_id: event.task_id,
    duration_ms: event.duration_ms,
    successful: event.successful,
    observed_at: event.timestamp,
  };
}

function describeTask(task: TaskRecord): string {
  return JSON.stringify({
    duration_ms: task.duration_ms,
    successful: task.successful,
    observed_at: task.observed_at.toISOString(),
  });
}

/**
 * A task is written once. A second delivery never replaces it: identical
 * content is a duplicate, differing content is an anomaly.
 */
export function mergeTaskEnd(
  existing: TaskRecord | undefined,
  event: TaskEndEvent,
): MergeResult<TaskRecord> {
  const incoming = taskFromEvent(event);
  if (existing === undefined) {
    return { next: incoming, changed: true, notices: [] };
  }

  const kept = describeTask(existing);
  const discarded = describeTask(incoming);

  const notice: MergeNotice = kept === discarded
    ? {
        kind: 'DuplicateEvent',
        job_id: existing.job_id,
        task_id: existing.task_id,
        detail: 'task already recorded',
      }
    : {
        kind: 'ConflictingMergeAnomaly',
        job_id: existing.job_id,
        task_id: existing.task_id,
        field: 'task',
        kept,
        discarded,
      };

  return { next: existing, changed: false, notices: [notice] };
}
