export type ReconciliationErrorKind =
  | 'UnrecognizedEventKind'
  | 'MalformedEvent'
  | 'InvalidEventData'
  | 'StorageUnavailable'
  | 'InvalidDate';

/**
 * Base class for every failure the ingestion pipeline reports by kind.
 * `kind` is what ends up as the reason of a failed tracking handle.
 */
export class ReconciliationError extends Error {
  readonly kind: ReconciliationErrorKind;

  constructor(kind: ReconciliationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

export class UnrecognizedEventKindError extends ReconciliationError {
  constructor(readonly eventName: unknown) {
    super('UnrecognizedEventKind', `Unrecognized event kind: ${JSON.stringify(eventName) ?? 'undefined'}`);
  }
}

export class MalformedEventError extends ReconciliationError {
  constructor(readonly issues: readonly string[]) {
    super('MalformedEvent', `Malformed event: ${issues.join('; ')}`);
  }
}

export class InvalidEventDataError extends ReconciliationError {
  constructor(message: string) {
    super('InvalidEventData', message);
  }
}

/** Transient storage failure; retried by the execution boundary. */
export class StorageUnavailableError extends ReconciliationError {
  constructor(message: string, cause?: unknown) {
    super('StorageUnavailable', message, { cause });
  }
}

export class InvalidDateError extends ReconciliationError {
  constructor(value: string) {
    super('InvalidDate', `Invalid date "${value}". Use YYYY-MM-DD`);
  }
}

export function isReconciliationError(err: unknown): err is ReconciliationError {
  return err instanceof ReconciliationError;
}
