import type { ClassifiedEvent, MergeNotice, SparkEvent } from '../domain/index.js';
import type { Logger } from '../shared/logger.js';
import type { JobScope, ReconciliationStore } from './ports.js';
import { emptyJob, mergeJobEnd, mergeJobStart, mergeTaskEnd } from './merge.js';

export interface ReconcileOutcome {
  readonly status: 'applied' | 'duplicate';
  readonly job_id: string;
  readonly key: string;
  readonly notices: readonly MergeNotice[];
}

/**
 * Applies one event to its job inside the job's exclusive scope.
 *
 * 1. Idempotency ledger check (fast path for redelivery).
 * 2. Merge into Job / Task ledger.
 * 3. Mark the key applied.
 *
 * Steps run in one scope, so the mark and the mutation commit together
 * or not at all. The merge rules are idempotent on their own; the ledger
 * only saves work.
 */
export async function reconcile(
  store: ReconciliationStore,
  classified: ClassifiedEvent,
  log: Logger,
): Promise<ReconcileOutcome> {
  const { event, key } = classified;

  const outcome = await store.withJobScope(event.job_id, async (scope): Promise<ReconcileOutcome> => {
    if (await scope.idempotency.hasBeenApplied(key)) {
      return {
        status: 'duplicate',
        job_id: event.job_id,
        key,
        notices: [{ kind: 'DuplicateEvent', job_id: event.job_id, detail: 'idempotency key already applied' }],
      };
    }

    const notices = await applyEvent(scope, event);
    await scope.idempotency.markApplied(key);

    return { status: 'applied', job_id: event.job_id, key, notices };
  });

  for (const notice of outcome.notices) {
    if (notice.kind === 'ConflictingMergeAnomaly') {
      log.warn({ ...notice, key }, 'Conflicting values with equal tie-break instants; kept first applied');
    } else {
      log.debug({ ...notice, key }, 'Duplicate event absorbed');
    }
  }

  return outcome;
}

async function applyEvent(scope: JobScope, event: SparkEvent): Promise<readonly MergeNotice[]> {
  switch (event.kind) {
    case 'JobStart': {
      const merged = mergeJobStart(await scope.jobs.find(event.job_id), event);
      if (merged.changed) await scope.jobs.save(merged.next);
      return merged.notices;
    }

    case 'JobEnd': {
      const merged = mergeJobEnd(await scope.jobs.find(event.job_id), event);
      if (merged.changed) await scope.jobs.save(merged.next);
      return merged.notices;
    }

    case 'TaskEnd': {
      // The job exists from its first event on, even before JobStart.
      if ((await scope.jobs.find(event.job_id)) === undefined) {
        await scope.jobs.save(emptyJob(event.job_id));
      }

      const merged = mergeTaskEnd(await scope.tasks.find(event.job_id, event.task_id), event);
      if (!merged.changed) return merged.notices;

      const recorded = await scope.tasks.record(merged.next);
      return recorded.inserted ? [] : mergeTaskEnd(recorded.existing, event).notices;
    }
  }
}
