import type { JobRecord, TaskRecord } from '../domain/index.js';
import { InvalidDateError } from '../domain/index.js';
import type { AnalyticsReader } from './ports.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface JobSummary {
  job_id: string;
  user: string | null;
  start_time: string;
  end_time: string;
  status: 'success' | 'failure';
  duration_seconds: number;
  total_tasks: number;
  failed_tasks: number;
  success_rate: number;
}

/** A job missing its start or its end has no summary yet. */
export type JobSummaryResult =
  | { readonly state: 'pending'; readonly job_id: string }
  | { readonly state: 'complete'; readonly summary: JobSummary };

/** Wire shape shared by `GET /jobs/:job_id` and completed tracking handles. */
export type JobPayload = JobSummary | { job_id: string; status: 'processing' };

export interface FleetSummary {
  total_jobs: number;
  total_tasks: number;
  failed_tasks: number;
  avg_success_rate: number;
  avg_duration_seconds: number;
}

export interface DailySummary {
  date: string;
  summary: FleetSummary;
  jobs: JobSummary[];
}

/**
 * Pure per-job computation.
 * `success_rate` is a fraction in [0, 1]; zero tasks gives 0, not NaN.
 */
export function summarizeJob(job: JobRecord, tasks: readonly TaskRecord[]): JobSummaryResult {
  if (job.start_time === null || job.end_time === null) {
    return { state: 'pending', job_id: job.job_id };
  }

  const total_tasks = tasks.length;
  const failed_tasks = tasks.filter((t) => !t.successful).length;

  return {
    state: 'complete',
    summary: {
      job_id: job.job_id,
      user: job.user,
      start_time: job.start_time.toISOString(),
      end_time: job.end_time.toISOString(),
      status: job.result === 'Succeeded' ? 'success' : 'failure',
      duration_seconds: (job.end_time.getTime() - job.start_time.getTime()) / 1000,
      total_tasks,
      failed_tasks,
      success_rate: total_tasks === 0 ? 0 : (total_tasks - failed_tasks) / total_tasks,
    },
  };
}

export function toJobPayload(result: JobSummaryResult): JobPayload {
  return result.state === 'pending'
    ? { job_id: result.job_id, status: 'processing' }
    : result.summary;
}

/**
 * Use case: analytics for one job.
 * Returns null when no event for `jobId` has been reconciled yet.
 */
export async function jobSummary(
  reader: AnalyticsReader,
  jobId: string,
): Promise<JobSummaryResult | null> {
  const job = await reader.findJob(jobId);
  if (job === undefined) return null;

  const tasks = await reader.listTasks(jobId);
  return summarizeJob(job, tasks);
}

/**
 * Parses `YYYY-MM-DD` into the UTC day window [from, to).
 * Rejects impossible calendar dates such as 2026-02-30.
 */
export function parseSummaryDate(date: string): { from: Date; to: Date } {
  const match = DATE_PATTERN.exec(date);
  if (match === null) throw new InvalidDateError(date);

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const from = new Date(Date.UTC(year, month - 1, day));

  if (
    from.getUTCFullYear() !== year
    || from.getUTCMonth() !== month - 1
    || from.getUTCDate() !== day
  ) {
    throw new InvalidDateError(date);
  }

  return { from, to: new Date(from.getTime() + DAY_MS) };
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Fleet-wide aggregates. `avg_success_rate` is unweighted by task count. */
export function summarizeFleet(jobs: readonly JobSummary[]): FleetSummary {
  return {
    total_jobs: jobs.length,
    total_tasks: jobs.reduce((sum, j) => sum + j.total_tasks, 0),
    failed_tasks: jobs.reduce((sum, j) => sum + j.failed_tasks, 0),
    avg_success_rate: mean(jobs.map((j) => j.success_rate)),
    avg_duration_seconds: mean(jobs.map((j) => j.duration_seconds)),
  };
}

/**
 * Use case: summary of every job that started on `date` (UTC).
 * Jobs still pending are left out entirely.
 */
export async function dailySummary(reader: AnalyticsReader, date: string): Promise<DailySummary> {
  const { from, to } = parseSummaryDate(date);
  const jobs = await reader.findJobsStartedBetween(from, to);

  const results = await Promise.all(
    jobs.map(async (job) => summarizeJob(job, await reader.listTasks(job.job_id))),
  );

  const completed: JobSummary[] = [];
  for (const result of results) {
    if (result.state === 'complete') completed.push(result.summary);
  }

  return { date, summary: summarizeFleet(completed), jobs: completed };
}
