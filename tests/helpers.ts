import { vi } from 'vitest';
import type { Logger } from '../src/shared/logger.js';

export const DAY = '2026-03-10';
export const T0 = '2026-03-10T08:00:00.000Z';
export const T1 = '2026-03-10T08:05:30.000Z';

export function jobStart(jobId: string | number, timestamp: string | number = T0, user = 'alice') {
  return { event: 'SparkListenerJobStart', job_id: jobId, timestamp, user };
}

export function taskEnd(
  jobId: string | number,
  taskId: string,
  opts: { duration_ms?: number; successful?: boolean; timestamp?: string } = {},
) {
  return {
    event: 'SparkListenerTaskEnd',
    job_id: jobId,
    task_id: taskId,
    timestamp: opts.timestamp ?? '2026-03-10T08:02:00.000Z',
    duration_ms: opts.duration_ms ?? 1500,
    successful: opts.successful ?? true,
  };
}

export function jobEnd(jobId: string | number, completionTime: string = T1, jobResult = 'JobSucceeded') {
  return {
    event: 'SparkListenerJobEnd',
    job_id: jobId,
    timestamp: completionTime,
    completion_time: completionTime,
    job_result: jobResult,
  };
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest]),
  );
}
