import { StorageUnavailableError, isReconciliationError } from '../domain/index.js';
import type { Logger } from '../shared/logger.js';
import { retry } from '../shared/retry.js';
import { classifyEvent } from './classify-event.js';
import { reconcile } from './reconcile.js';
import { jobSummary, toJobPayload } from './analytics.js';
import type { AnalyticsReader, FinalTrackingStatus, ReconciliationStore } from './ports.js';

export interface RetryPolicy {
  /** Total attempts for a reconciliation hitting transient storage errors. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ProcessingDeps {
  store: ReconciliationStore;
  reader: AnalyticsReader;
  log: Logger;
  retry: RetryPolicy;
}

/**
 * Runs one submitted envelope to completion and returns the final status
 * for its tracking handle.
 *
 * - Classification/validation errors fail the handle with their kind.
 * - `StorageUnavailable` is retried with backoff, and fails the handle
 *   only once attempts are exhausted.
 * - Anything else is rethrown: the caller decides whether the unit of
 *   work is redelivered.
 */
export async function processEnvelope(
  deps: ProcessingDeps,
  envelope: unknown,
  handleId: string,
): Promise<FinalTrackingStatus> {
  try {
    const classified = classifyEvent(envelope);

    const outcome = await withStorageRetry(deps, handleId, 'reconciliation', () =>
      reconcile(deps.store, classified, deps.log));

    deps.log.info(
      { handle_id: handleId, job_id: outcome.job_id, key: outcome.key, status: outcome.status },
      'Event reconciled',
    );

    // The event is committed at this point; only the read is repeated.
    const summary = await withStorageRetry(deps, handleId, 'job summary read', () =>
      jobSummary(deps.reader, outcome.job_id));

    return {
      state: 'succeeded',
      result: toJobPayload(summary ?? { state: 'pending', job_id: outcome.job_id }),
    };
  } catch (err: unknown) {
    if (!isReconciliationError(err)) throw err;

    deps.log.warn({ err, handle_id: handleId, kind: err.kind }, 'Event rejected');
    return { state: 'failed', reason: err.kind, message: err.message };
  }
}

function withStorageRetry<T>(
  deps: ProcessingDeps,
  handleId: string,
  step: string,
  fn: () => Promise<T>,
): Promise<T> {
  return retry(fn, {
    retries: Math.max(0, deps.retry.maxAttempts - 1),
    minDelayMs: deps.retry.baseDelayMs,
    maxDelayMs: deps.retry.maxDelayMs,
    shouldRetry: (err) => err instanceof StorageUnavailableError,
    onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
      deps.log.warn(
        { err: error, handle_id: handleId, step, attempt, maxAttempts, delayMs },
        `Storage unavailable, retrying ${step}`,
      );
    },
  });
}
