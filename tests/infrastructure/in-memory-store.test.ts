import { describe, it, expect, beforeEach } from 'vitest';
import { emptyJob } from '../../src/application/merge.js';
import type { JobRecord, TaskRecord } from '../../src/domain/index.js';
import { InMemoryReconciliationStore } from '../../src/infrastructure/memory/in-memory-store.js';

const started = (jobId: string, iso: string): JobRecord => ({
  ...emptyJob(jobId),
  user: 'alice',
  start_time: new Date(iso),
});

const task = (jobId: string, taskId: string): TaskRecord => ({
  job_id: jobId,
  task_id: taskId,
  duration_ms: 10,
  successful: true,
  observed_at: new Date('2026-03-10T08:00:00.000Z'),
});

describe('InMemoryReconciliationStore', () => {
  let store: InMemoryReconciliationStore;

  beforeEach(() => {
    store = new InMemoryReconciliationStore();
  });

  it('commits scope writes when the scope resolves', async () => {
    await store.withJobScope('j1', async (scope) => {
      await scope.jobs.save(emptyJob('j1'));
      await scope.tasks.record(task('j1', 't1'));
      await scope.idempotency.markApplied('k1');
    });

    expect(await store.findJob('j1')).toEqual(emptyJob('j1'));
    expect(await store.listTasks('j1')).toEqual([task('j1', 't1')]);
    expect(store.appliedKeyCount).toBe(1);
  });

  it('discards scope writes when the scope rejects', async () => {
    await expect(store.withJobScope('j1', async (scope) => {
      await scope.jobs.save(emptyJob('j1'));
      await scope.idempotency.markApplied('k1');
      throw new Error('abort');
    })).rejects.toThrow('abort');

    expect(await store.findJob('j1')).toBeUndefined();
    expect(store.appliedKeyCount).toBe(0);
  });

  it('reads its own staged writes inside a scope', async () => {
    await store.withJobScope('j1', async (scope) => {
      await scope.tasks.record(task('j1', 't2'));
      await scope.idempotency.markApplied('k1');

      expect(await scope.tasks.find('j1', 't2')).toEqual(task('j1', 't2'));
      expect(await scope.tasks.listForJob('j1')).toHaveLength(1);
      expect(await scope.idempotency.hasBeenApplied('k1')).toBe(true);
      expect(await store.findJob('j1')).toBeUndefined();
    });
  });

  it('refuses a second record for the same task', async () => {
    await store.withJobScope('j1', (scope) => scope.tasks.record(task('j1', 't1')));

    const second = await store.withJobScope('j1', (scope) =>
      scope.tasks.record({ ...task('j1', 't1'), successful: false }));

    expect(second).toEqual({ inserted: false, existing: task('j1', 't1') });
  });

  it('lists tasks of one job sorted by task id', async () => {
    await store.withJobScope('j1', async (scope) => {
      await scope.tasks.record(task('j1', 'b'));
      await scope.tasks.record(task('j1', 'a'));
    });
    await store.withJobScope('j2', (scope) => scope.tasks.record(task('j2', 'a')));

    expect((await store.listTasks('j1')).map((t) => t.task_id)).toEqual(['a', 'b']);
  });

  it('keeps the tasks of jobs with overlapping ids apart', async () => {
    await store.withJobScope('j1', (scope) => scope.tasks.record(task('j1', 't1')));
    await store.withJobScope('j10', (scope) => scope.tasks.record(task('j10', 't1')));

    expect(await store.listTasks('j1')).toEqual([task('j1', 't1')]);
    expect(await store.listTasks('j10')).toEqual([task('j10', 't1')]);
    expect(await store.listTasks('j')).toEqual([]);
  });

  it('merges staged and committed tasks when listing inside a scope', async () => {
    await store.withJobScope('j1', (scope) => scope.tasks.record(task('j1', 'b')));

    await store.withJobScope('j1', async (scope) => {
      await scope.tasks.record(task('j1', 'a'));

      expect((await scope.tasks.listForJob('j1')).map((t) => t.task_id)).toEqual(['a', 'b']);
      expect((await store.listTasks('j1')).map((t) => t.task_id)).toEqual(['b']);
    });
  });

  it('finds jobs by start time in a half-open window', async () => {
    await store.withJobScope('x', async (scope) => {
      await scope.jobs.save(started('late', '2026-03-10T23:59:59.999Z'));
      await scope.jobs.save(started('early', '2026-03-10T00:00:00.000Z'));
      await scope.jobs.save(started('next-day', '2026-03-11T00:00:00.000Z'));
      await scope.jobs.save(emptyJob('no-start'));
    });

    const jobs = await store.findJobsStartedBetween(
      new Date('2026-03-10T00:00:00.000Z'),
      new Date('2026-03-11T00:00:00.000Z'),
    );

    expect(jobs.map((j) => j.job_id)).toEqual(['early', 'late']);
  });
});
