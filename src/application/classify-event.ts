import { createHash } from 'node:crypto';
import type { z } from 'zod';
import type { ClassifiedEvent, JobEndEvent, SparkEvent } from '../domain/index.js';
import {
  InvalidEventDataError,
  MalformedEventError,
  UnrecognizedEventKindError,
} from '../domain/index.js';
import { jobEndSchema, jobStartSchema, taskEndSchema } from './event-schema.js';

const SUCCEEDED_RESULTS = new Set(['jobsucceeded', 'succeeded', 'success']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedEventError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function mapJobResult(raw: string): JobEndEvent['result'] {
  return SUCCEEDED_RESULTS.has(raw.toLowerCase()) ? 'Succeeded' : 'Failed';
}

/** Stable serialisation of the fields that define an event's effect. */
function canonicalContent(event: SparkEvent): string {
  switch (event.kind) {
    case 'JobStart':
      return JSON.stringify([event.timestamp.toISOString(), event.user]);
    case 'TaskEnd':
      return JSON.stringify([
        event.timestamp.toISOString(),
        event.duration_ms,
        event.successful,
      ]);
    case 'JobEnd':
      return JSON.stringify([event.completion_time.toISOString(), event.result]);
  }
}

/**
 * Fingerprint used by the idempotency ledger:
 * `<kind>:<job_id>[:<task_id>]:<event_id | content hash>`.
 */
export function idempotencyKey(event: SparkEvent, eventId?: string): string {
  const scope = event.kind === 'TaskEnd'
    ? `${event.kind}:${event.job_id}:${event.task_id}`
    : `${event.kind}:${event.job_id}`;

  const suffix = eventId
    ?? createHash('sha256').update(canonicalContent(event)).digest('hex').slice(0, 16);

  return `${scope}:${suffix}`;
}

/**
 * Turns a raw envelope into one of the three typed variants.
 *
 * @throws UnrecognizedEventKindError when `event` names no known variant
 * @throws MalformedEventError when required fields are missing or mistyped
 * @throws InvalidEventDataError when a field is well-typed but out of range
 */
export function classifyEvent(payload: unknown): ClassifiedEvent {
  if (!isRecord(payload)) {
    throw new MalformedEventError(['root: expected a JSON object']);
  }

  let event: SparkEvent;
  let eventId: string | undefined;

  switch (payload['event']) {
    case 'SparkListenerJobStart': {
      const data = parseOrThrow(jobStartSchema, payload);
      eventId = data.event_id;
      event = {
        kind: 'JobStart',
        job_id: data.job_id,
        timestamp: data.timestamp,
        user: data.user,
      };
      break;
    }

    case 'SparkListenerTaskEnd': {
      const data = parseOrThrow(taskEndSchema, payload);
      if (data.duration_ms < 0) {
        throw new InvalidEventDataError(
          `duration_ms must be non-negative (job ${data.job_id}, task ${data.task_id}): ${data.duration_ms}`,
        );
      }
      eventId = data.event_id;
      event = {
        kind: 'TaskEnd',
        job_id: data.job_id,
        task_id: data.task_id,
        timestamp: data.timestamp,
        duration_ms: data.duration_ms,
        successful: data.successful,
      };
      break;
    }

    case 'SparkListenerJobEnd': {
      const data = parseOrThrow(jobEndSchema, payload);
      const completion = data.completion_time ?? data.timestamp;
      if (completion === undefined) {
        throw new MalformedEventError(['completion_time: timestamp or completion_time is required']);
      }
      eventId = data.event_id;
      event = {
        kind: 'JobEnd',
        job_id: data.job_id,
        completion_time: completion,
        result: mapJobResult(data.job_result),
      };
      break;
    }

    default:
      throw new UnrecognizedEventKindError(payload['event']);
  }

  return Object.freeze({
    event: Object.freeze(event),
    key: idempotencyKey(event, eventId),
  });
}
