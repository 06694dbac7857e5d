/**
 * Core domain types for Spark listener events.
 *
 * Raw envelopes never travel past the classifier: everything downstream
 * works with the tagged `SparkEvent` union. These types carry no
 * framework dependencies.
 */

/** Untyped JSON envelope as accepted by the transport. */
export type RawEnvelope = Record<string, unknown>;

export interface JobStartEvent {
  readonly kind: 'JobStart';
  readonly job_id: string;
  readonly timestamp: Date;
  readonly user: string;
}

export interface TaskEndEvent {
  readonly kind: 'TaskEnd';
  readonly job_id: string;
  readonly task_id: string;
  readonly timestamp: Date;
  readonly duration_ms: number;
  readonly successful: boolean;
}

export interface JobEndEvent {
  readonly kind: 'JobEnd';
  readonly job_id: string;
  /** Effective completion instant: `completion_time`, else `timestamp`. */
  readonly completion_time: Date;
  readonly result: 'Succeeded' | 'Failed';
}

export type SparkEvent = JobStartEvent | TaskEndEvent | JobEndEvent;

export type SparkEventKind = SparkEvent['kind'];

/**
 * Output of the classifier: the typed event plus its idempotency key.
 * Identical payloads always yield identical keys.
 */
export interface ClassifiedEvent {
  readonly event: SparkEvent;
  readonly key: string;
}
