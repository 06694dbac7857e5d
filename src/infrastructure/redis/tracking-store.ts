import type { Redis } from 'ioredis';
import { z } from 'zod';
import type { FinalTrackingStatus, JobPayload, TrackingStatus } from '../../application/index.js';

const KEY_PREFIX = 'tracking:';

/**
 * Compare-and-set: replaces the record only while it is still pending,
 * so a handle leaves `pending` exactly once even under redelivery.
 */
const FINALIZE_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return 0 end
local record = cjson.decode(current)
if record.status.state ~= 'pending' then return 0 end
redis.call('SET', KEYS[1], ARGV[1], 'KEEPTTL')
return 1
`;

const failureReasonSchema = z.enum([
  'UnrecognizedEventKind',
  'MalformedEvent',
  'InvalidEventData',
  'StorageUnavailable',
  'InvalidDate',
  'InternalError',
]);

const jobPayloadSchema = z.custom<JobPayload>(
  (value) => typeof value === 'object' && value !== null && 'job_id' in value,
  { message: 'result must be a job payload' },
);

const trackingStatusSchema = z.discriminatedUnion('state', [
  z.object({ state: z.literal('pending') }),
  z.object({ state: z.literal('succeeded'), result: jobPayloadSchema }),
  z.object({ state: z.literal('failed'), reason: failureReasonSchema, message: z.string() }),
]);

const trackingRecordSchema = z.object({
  id: z.string(),
  status: trackingStatusSchema,
  created_at: z.string(),
  completed_at: z.string().nullable(),
});

export type TrackingRecord = z.infer<typeof trackingRecordSchema>;

/**
 * Tracking handles stored as JSON strings under `tracking:<id>`.
 * Handles are operational state, not analytics: they expire after `ttlSeconds`.
 */
export class RedisTrackingStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number,
  ) {}

  async create(id: string): Promise<void> {
    const record: TrackingRecord = {
      id,
      status: { state: 'pending' },
      created_at: new Date().toISOString(),
      completed_at: null,
    };
    await this.redis.set(KEY_PREFIX + id, JSON.stringify(record), 'EX', this.ttlSeconds);
  }

  /** Returns false when the handle is unknown or was already finalised. */
  async finalize(id: string, status: FinalTrackingStatus): Promise<boolean> {
    const current = await this.get(id);
    if (current === null) return false;

    const next: TrackingRecord = {
      ...current,
      status,
      completed_at: new Date().toISOString(),
    };
    const updated = await this.redis.eval(FINALIZE_SCRIPT, 1, KEY_PREFIX + id, JSON.stringify(next));
    return updated === 1;
  }

  async get(id: string): Promise<TrackingRecord | null> {
    const raw = await this.redis.get(KEY_PREFIX + id);
    if (raw === null) return null;

    const parsed = trackingRecordSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Corrupt tracking record for ${id}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async status(id: string): Promise<TrackingStatus | null> {
    const record = await this.get(id);
    return record?.status ?? null;
  }
}
