import type { JobRecord, TaskRecord } from '../../domain/index.js';
import type {
  AnalyticsReader,
  JobScope,
  ReconciliationStore,
  TaskRecordResult,
} from '../../application/ports.js';
import { KeyedMutex } from '../../shared/keyed-mutex.js';

/** Tasks indexed by job, then task id. */
type TaskIndex = Map<string, Map<string, TaskRecord>>;

function lookupTask(index: TaskIndex, jobId: string, taskId: string): TaskRecord | undefined {
  return index.get(jobId)?.get(taskId);
}

function addTask(index: TaskIndex, task: TaskRecord): void {
  let byTask = index.get(task.job_id);
  if (byTask === undefined) {
    byTask = new Map();
    index.set(task.job_id, byTask);
  }
  byTask.set(task.task_id, task);
}

/**
 * In-memory reconciliation store.
 *
 * Backs `EXECUTION_MODE=inline` runs without Postgres and the test suite.
 * Same contract as the Postgres adapter: one scope per job at a time,
 * and writes staged inside a scope are committed only when it resolves.
 */
export class InMemoryReconciliationStore implements ReconciliationStore, AnalyticsReader {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly tasks: TaskIndex = new Map();
  private readonly appliedKeys = new Set<string>();
  private readonly mutex = new KeyedMutex();

  async withJobScope<T>(jobId: string, fn: (scope: JobScope) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(jobId, async () => {
      const stagedJobs = new Map<string, JobRecord>();
      const stagedTasks: TaskIndex = new Map();
      const stagedKeys = new Set<string>();

      const scope: JobScope = {
        jobs: {
          find: async (id) => stagedJobs.get(id) ?? this.jobs.get(id),
          save: async (job) => {
            stagedJobs.set(job.job_id, job);
          },
        },
        tasks: {
          find: async (id, taskId) =>
            lookupTask(stagedTasks, id, taskId) ?? lookupTask(this.tasks, id, taskId),
          record: async (task): Promise<TaskRecordResult> => {
            const existing = lookupTask(stagedTasks, task.job_id, task.task_id)
              ?? lookupTask(this.tasks, task.job_id, task.task_id);
            if (existing !== undefined) return { inserted: false, existing };
            addTask(stagedTasks, task);
            return { inserted: true };
          },
          listForJob: async (id) => this.collectTasks(id, stagedTasks),
        },
        idempotency: {
          hasBeenApplied: async (key) => stagedKeys.has(key) || this.appliedKeys.has(key),
          markApplied: async (key) => {
            stagedKeys.add(key);
          },
        },
      };

      const result = await fn(scope);

      // Commit: nothing above has touched shared state yet.
      for (const [id, job] of stagedJobs) this.jobs.set(id, job);
      for (const byTask of stagedTasks.values()) {
        for (const task of byTask.values()) addTask(this.tasks, task);
      }
      for (const key of stagedKeys) this.appliedKeys.add(key);

      return result;
    });
  }

  async findJob(jobId: string): Promise<JobRecord | undefined> {
    return this.jobs.get(jobId);
  }

  async listTasks(jobId: string): Promise<TaskRecord[]> {
    return this.collectTasks(jobId);
  }

  async findJobsStartedBetween(from: Date, to: Date): Promise<JobRecord[]> {
    const lower = from.getTime();
    const upper = to.getTime();

    return [...this.jobs.values()]
      .filter((job) => {
        const start = job.start_time?.getTime();
        return start !== undefined && start >= lower && start < upper;
      })
      .sort((a, b) => (a.start_time?.getTime() ?? 0) - (b.start_time?.getTime() ?? 0)
        || a.job_id.localeCompare(b.job_id));
  }

  /** Number of keys recorded in the idempotency ledger. */
  get appliedKeyCount(): number {
    return this.appliedKeys.size;
  }

  private collectTasks(jobId: string, staged?: TaskIndex): TaskRecord[] {
    const byTask = new Map(this.tasks.get(jobId));
    for (const [taskId, task] of staged?.get(jobId) ?? []) byTask.set(taskId, task);
    return [...byTask.values()].sort((a, b) => a.task_id.localeCompare(b.task_id));
  }
}
