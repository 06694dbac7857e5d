export { envelopeSchema, jobStartSchema, taskEndSchema, jobEndSchema } from './event-schema.js';
export type { EnvelopeInput } from './event-schema.js';
export { classifyEvent, idempotencyKey, mapJobResult } from './classify-event.js';
export { emptyJob, mergeJobStart, mergeJobEnd, mergeTaskEnd, taskFromEvent } from './merge.js';
export type { MergeResult } from './merge.js';
export { reconcile } from './reconcile.js';
export type { ReconcileOutcome } from './reconcile.js';
export {
  summarizeJob,
  summarizeFleet,
  toJobPayload,
  jobSummary,
  dailySummary,
  parseSummaryDate,
} from './analytics.js';
export type { JobSummary, JobSummaryResult, JobPayload, FleetSummary, DailySummary } from './analytics.js';
export { processEnvelope } from './process-envelope.js';
export type { ProcessingDeps, RetryPolicy } from './process-envelope.js';
export type {
  JobRepository,
  TaskLedger,
  TaskRecordResult,
  IdempotencyLedger,
  JobScope,
  ReconciliationStore,
  AnalyticsReader,
  TrackingHandle,
  TrackingStatus,
  FinalTrackingStatus,
  FailureReason,
  ExecutionBoundary,
} from './ports.js';
