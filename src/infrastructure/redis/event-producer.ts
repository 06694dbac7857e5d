import type { Redis } from 'ioredis';
import type { RawEnvelope } from '../../domain/index.js';

export const STREAM_KEY = 'spark_events_stream';

/**
 * Appends a submitted envelope to the Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). The envelope travels
 * as JSON next to the tracking handle that will report its outcome.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEnvelope(
  redis: Redis,
  handleId: string,
  envelope: RawEnvelope,
): Promise<string> {
  const entryId = await redis.xadd(
    STREAM_KEY,
    '*',
    'handle_id', handleId,
    'envelope', JSON.stringify(envelope),
    'submitted_at', new Date().toISOString(),
  );

  if (entryId === null) {
    throw new Error('XADD returned no entry id');
  }
  return entryId;
}
