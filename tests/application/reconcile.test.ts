import { describe, it, expect, beforeEach } from 'vitest';
import { classifyEvent } from '../../src/application/classify-event.js';
import { reconcile } from '../../src/application/reconcile.js';
import { dailySummary, jobSummary } from '../../src/application/analytics.js';
import type { JobScope, ReconciliationStore } from '../../src/application/ports.js';
import { StorageUnavailableError } from '../../src/domain/index.js';
import { InMemoryReconciliationStore } from '../../src/infrastructure/memory/in-memory-store.js';
import { DAY, fakeLogger, jobEnd, jobStart, permutations, taskEnd, T0, T1 } from '../helpers.js';

/** Store whose task ledger fails every write, as a dropped connection would. */
class FailingTaskWrites implements ReconciliationStore {
  constructor(private readonly inner: InMemoryReconciliationStore) {}

  withJobScope<T>(jobId: string, fn: (scope: JobScope) => Promise<T>): Promise<T> {
    return this.inner.withJobScope(jobId, (scope) =>
      fn({
        ...scope,
        tasks: {
          ...scope.tasks,
          record: async () => {
            throw new StorageUnavailableError('connection reset');
          },
        },
      }),
    );
  }
}

describe('reconcile', () => {
  let store: InMemoryReconciliationStore;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    store = new InMemoryReconciliationStore();
    log = fakeLogger();
  });

  const apply = (payload: unknown) => reconcile(store, classifyEvent(payload), log);

  // ── Idempotence ───────────────────────────────────

  it('applies a new event', async () => {
    const outcome = await apply(jobStart('j1'));

    expect(outcome.status).toBe('applied');
    expect(outcome.job_id).toBe('j1');
    expect(outcome.notices).toEqual([]);
    expect(store.appliedKeyCount).toBe(1);
  });

  it('absorbs a redelivered event through the idempotency ledger', async () => {
    const first = await apply(taskEnd('j1', 't1'));
    const second = await apply(taskEnd('j1', 't1'));

    expect(second.status).toBe('duplicate');
    expect(second.key).toBe(first.key);
    expect(second.notices).toEqual([
      { kind: 'DuplicateEvent', job_id: 'j1', detail: 'idempotency key already applied' },
    ]);
    expect(await store.listTasks('j1')).toHaveLength(1);
    expect(log.debug).toHaveBeenCalledWith(
      {
        kind: 'DuplicateEvent',
        job_id: 'j1',
        detail: 'idempotency key already applied',
        key: first.key,
      },
      'Duplicate event absorbed',
    );
  });

  it('keeps the first task when a different payload reuses its task_id', async () => {
    await apply(taskEnd('j1', 't1', { successful: true }));
    const outcome = await apply(taskEnd('j1', 't1', { successful: false }));

    expect(outcome.status).toBe('applied');
    expect(outcome.notices).toHaveLength(1);
    expect(outcome.notices[0]?.kind).toBe('ConflictingMergeAnomaly');
    expect(log.warn).toHaveBeenCalledTimes(1);

    const tasks = await store.listTasks('j1');
    expect(tasks.map((t) => t.successful)).toEqual([true]);
  });

  it('creates a placeholder job on a task end', async () => {
    await apply(taskEnd('j1', 't1'));

    expect(await store.findJob('j1')).toEqual({
      job_id: 'j1',
      user: null,
      start_time: null,
      end_time: null,
      result: 'Unknown',
    });
  });

  // ── Order independence ────────────────────────────

  it.each(permutations(['start', 'task', 'end'] as const).map((order) => ({ label: order.join(' → '), order })))(
    'reaches the same summary for order $label',
    async ({ order }) => {
      const payloads = {
        start: jobStart('j1', T0, 'alice'),
        task: taskEnd('j1', 't1'),
        end: jobEnd('j1', T1),
      };

      for (const step of order) {
        await apply(payloads[step]);
      }

      expect(await jobSummary(store, 'j1')).toEqual({
        state: 'complete',
        summary: {
          job_id: 'j1',
          user: 'alice',
          start_time: T0,
          end_time: T1,
          status: 'success',
          duration_seconds: 330,
          total_tasks: 1,
          failed_tasks: 0,
          success_rate: 1,
        },
      });
    },
  );

  it('settles conflicting starts and ends the same way in every order', async () => {
    const payloads = [
      jobStart('j7', '2026-03-10T08:01:00.000Z', 'bob'),
      jobStart('j7', T0, 'alice'),
      jobEnd('j7', '2026-03-10T08:07:00.000Z', 'JobFailed'),
      jobEnd('j7', T1, 'JobSucceeded'),
      taskEnd('j7', 't1'),
    ];

    for (const order of permutations(payloads)) {
      const fresh = new InMemoryReconciliationStore();
      for (const payload of order) {
        await reconcile(fresh, classifyEvent(payload), log);
      }

      expect(await fresh.findJob('j7')).toEqual({
        job_id: 'j7',
        user: 'alice',
        start_time: new Date(T0),
        end_time: new Date(T1),
        result: 'Succeeded',
      });
      expect(await fresh.listTasks('j7')).toHaveLength(1);
    }
  });

  it('counts a task delivered twice only once', async () => {
    await apply(jobStart('j2'));
    await apply(taskEnd('j2', 't1', { successful: false }));
    await apply(taskEnd('j2', 't1', { successful: false }));
    await apply(taskEnd('j2', 't2'));
    await apply(jobEnd('j2', T1, 'JobFailed'));

    const result = await jobSummary(store, 'j2');
    expect(result?.state === 'complete' && result.summary).toMatchObject({
      status: 'failure',
      total_tasks: 2,
      failed_tasks: 1,
      success_rate: 0.5,
    });
  });

  it('leaves a job without an end pending', async () => {
    await apply(jobStart('j3'));
    await apply(taskEnd('j3', 't1'));

    expect(await jobSummary(store, 'j3')).toEqual({ state: 'pending', job_id: 'j3' });
  });

  it('keeps a job that only ever saw a task end pending and out of the daily summary', async () => {
    await apply(taskEnd(99, 't1'));

    expect(await jobSummary(store, '99')).toEqual({ state: 'pending', job_id: '99' });
    expect((await dailySummary(store, DAY)).jobs).toEqual([]);
  });

  // ── Concurrency ───────────────────────────────────

  it('applies concurrent deliveries of one task exactly once', async () => {
    const outcomes = await Promise.all([
      apply(taskEnd('j4', 't1')),
      apply(taskEnd('j4', 't1')),
      apply(taskEnd('j4', 't1')),
    ]);

    expect(outcomes.map((o) => o.status).sort()).toEqual(['applied', 'duplicate', 'duplicate']);
    expect(await store.listTasks('j4')).toHaveLength(1);
    expect(store.appliedKeyCount).toBe(1);
  });

  it('keeps distinct tasks delivered concurrently', async () => {
    await Promise.all(
      ['t1', 't2', 't3', 't4'].map((taskId) => apply(taskEnd('j5', taskId))),
    );

    expect((await store.listTasks('j5')).map((t) => t.task_id)).toEqual(['t1', 't2', 't3', 't4']);
  });

  // ── Atomicity ─────────────────────────────────────

  it('commits nothing when a write fails mid-reconciliation', async () => {
    const failing = new FailingTaskWrites(store);

    await expect(reconcile(failing, classifyEvent(taskEnd('j6', 't1')), log))
      .rejects.toBeInstanceOf(StorageUnavailableError);

    expect(await store.findJob('j6')).toBeUndefined();
    expect(await store.listTasks('j6')).toEqual([]);
    expect(store.appliedKeyCount).toBe(0);

    // A later redelivery is not mistaken for a duplicate.
    const retried = await apply(taskEnd('j6', 't1'));
    expect(retried.status).toBe('applied');
  });
});
