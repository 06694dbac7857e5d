import { z } from 'zod';

/**
 * Zod schemas for inbound Spark listener envelopes.
 *
 * - `envelopeSchema` is the transport pre-filter: it only checks that a
 *   body is routable (an object with an `event` name and a `job_id`).
 * - The per-variant schemas are applied by the classifier once the
 *   `event` discriminator has been matched.
 *
 * Numeric ids are normalised to their decimal string so `7` and `"7"`
 * address the same job.
 */
// Above 2^53 a number no longer names one id exactly.
const numericIdSchema = z
  .number()
  .int()
  .nonnegative()
  .safe({ message: 'numeric ids must be safe integers; send larger ids as strings' });

const idSchema = z
  .union([z.string().min(1).max(255), numericIdSchema])
  .transform((value) => String(value));

/** Largest epoch millisecond a `Date` can hold. */
export const MAX_EPOCH_MS = 8_640_000_000_000_000;

/** Upper bound of the `task_events.duration_ms` column (Postgres INTEGER). */
export const MAX_DURATION_MS = 2_147_483_647;

/** ISO-8601 with an explicit offset, or epoch milliseconds. */
const instantSchema = z
  .union([
    z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
    z.number().int().nonnegative().max(MAX_EPOCH_MS, { message: 'epoch milliseconds out of range' }),
  ])
  .transform((value) => new Date(value));

const eventIdSchema = z.string().min(1).max(255).optional();

export const envelopeSchema = z
  .object({
    event: z.string().min(1).max(255),
    job_id: z.union([z.string().min(1).max(255), numericIdSchema]),
  })
  .passthrough();

export type EnvelopeInput = z.infer<typeof envelopeSchema>;

export const jobStartSchema = z.object({
  event: z.literal('SparkListenerJobStart'),
  event_id: eventIdSchema,
  job_id: idSchema,
  timestamp: instantSchema,
  user: z.string().min(1).max(255),
});

export const taskEndSchema = z.object({
  event: z.literal('SparkListenerTaskEnd'),
  event_id: eventIdSchema,
  job_id: idSchema,
  task_id: idSchema,
  timestamp: instantSchema,
  // Sign is checked after parsing: a negative duration is bad data, not a bad shape.
  duration_ms: z
    .number()
    .int({ message: 'duration_ms must be an integer' })
    .max(MAX_DURATION_MS, { message: `duration_ms must be at most ${MAX_DURATION_MS}` }),
  successful: z.boolean(),
});

export const jobEndSchema = z
  .object({
    event: z.literal('SparkListenerJobEnd'),
    event_id: eventIdSchema,
    job_id: idSchema,
    timestamp: instantSchema.optional(),
    completion_time: instantSchema.optional(),
    job_result: z.string().min(1).max(255),
  })
  .refine((data) => data.timestamp !== undefined || data.completion_time !== undefined, {
    message: 'timestamp or completion_time is required',
    path: ['completion_time'],
  });
