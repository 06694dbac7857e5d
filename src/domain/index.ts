export type {
  RawEnvelope,
  JobStartEvent,
  TaskEndEvent,
  JobEndEvent,
  SparkEvent,
  SparkEventKind,
  ClassifiedEvent,
} from './event.js';
export { deriveJobStatus } from './job.js';
export type { JobResult, JobRecord, TaskRecord, JobStatus, MergeNotice } from './job.js';
export {
  ReconciliationError,
  UnrecognizedEventKindError,
  MalformedEventError,
  InvalidEventDataError,
  StorageUnavailableError,
  InvalidDateError,
  isReconciliationError,
} from './errors.js';
export type { ReconciliationErrorKind } from './errors.js';
