import { randomUUID } from 'node:crypto';
import type { Redis } from 'ioredis';
import type { RawEnvelope } from '../../domain/index.js';
import type { ExecutionBoundary, TrackingHandle, TrackingStatus } from '../../application/index.js';
import { enqueueEnvelope } from './event-producer.js';
import type { RedisTrackingStore } from './tracking-store.js';

/**
 * Execution boundary backed by a Redis Stream.
 *
 * The handle is written before the envelope is queued, so a worker can
 * never finish an entry whose handle does not exist yet.
 * Reconciliation runs in `src/worker.ts`.
 */
export class RedisExecutionBoundary implements ExecutionBoundary {
  constructor(
    private readonly redis: Redis,
    private readonly tracking: RedisTrackingStore,
  ) {}

  async submit(envelope: RawEnvelope): Promise<TrackingHandle> {
    const id = randomUUID();
    await this.tracking.create(id);
    await enqueueEnvelope(this.redis, id, envelope);
    return { id };
  }

  async poll(handleId: string): Promise<TrackingStatus | null> {
    return this.tracking.status(handleId);
  }
}
