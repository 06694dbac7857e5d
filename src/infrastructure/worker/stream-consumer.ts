import type { Redis } from 'ioredis';
import { z } from 'zod';
import { processEnvelope } from '../../application/index.js';
import type { ProcessingDeps } from '../../application/index.js';
import type { Logger } from '../../shared/logger.js';
import { createLimiter } from '../../shared/limiter.js';
import type { Limiter } from '../../shared/limiter.js';
import { STREAM_KEY } from '../redis/event-producer.js';
import type { RedisTrackingStore } from '../redis/tracking-store.js';

export const GROUP_NAME = 'event_reconcilers';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

export interface ConsumerOptions {
  consumerName: string;
  /** Entries reconciled in parallel. Same-job entries still serialize in the store. */
  concurrency: number;
}

/** What handling a single entry needs. */
export interface EntryDeps {
  redis: Pick<Redis, 'xack'>;
  tracking: Pick<RedisTrackingStore, 'finalize'>;
  pipeline: ProcessingDeps;
  log: Logger;
}

/** What the start-up recovery pass needs. */
export interface PendingDeps extends EntryDeps {
  redis: Pick<Redis, 'xack' | 'xreadgroup'>;
}

/** Dependencies bundled for the consumer loop. */
export interface ConsumerDeps extends PendingDeps {
  redis: Redis;
  tracking: RedisTrackingStore;
}

export interface StreamEntry {
  handle_id: string;
  envelope: unknown;
}

// [[stream, [[id, fields | nil], ...]], ...]; fields are nil for entries
// deleted while still pending.
const readReplySchema = z.array(
  z.tuple([
    z.string(),
    z.array(z.tuple([z.string(), z.array(z.string()).nullable()])),
  ]),
);

/** Flattens an XREADGROUP reply into [streamId, fields] pairs. */
export function parseReadReply(response: unknown): Array<[string, string[]]> {
  if (response === null) return [];
  return readReplySchema
    .parse(response)
    .flatMap(([, entries]) => entries.map(([id, fields]): [string, string[]] => [id, fields ?? []]));
}

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "0": every envelope ever submitted gets reconciled, including
 * ones queued before the first worker booted.
 *
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', STREAM_KEY, GROUP_NAME, '0', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer group created (from 0)');
  } catch (err: unknown) {
    // BUSYGROUP = group already exists, safe to ignore
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Parses a raw Redis Stream entry.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 * An envelope that is not valid JSON comes back as `undefined` and is
 * rejected by the classifier like any other malformed event.
 */
export function parseStreamEntry(fields: string[]): StreamEntry {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  let envelope: unknown;
  try {
    envelope = JSON.parse(map.get('envelope') ?? 'null');
  } catch {
    envelope = undefined;
  }

  return { handle_id: map.get('handle_id') ?? '', envelope };
}

/**
 * Main consumer loop.
 *
 * 1. XREADGROUP with BLOCK: waits for new messages on the stream.
 * 2. Each batch is reconciled with at most `concurrency` entries in flight.
 * 3. An entry is XACKed only after its tracking handle is finalised.
 *
 * Unexpected failures leave the entry unacknowledged; it is picked up
 * again from the pending entries list on the next start. The merge rules
 * make that redelivery safe.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(
  deps: ConsumerDeps,
  options: ConsumerOptions,
  signal: AbortSignal,
): Promise<void> {
  const limit = createLimiter(options.concurrency);

  await ensureConsumerGroup(deps.redis, deps.log);

  deps.log.info(
    { consumer: options.consumerName, group: GROUP_NAME, stream: STREAM_KEY, concurrency: options.concurrency },
    'Consumer started',
  );

  // First, claim any pending messages from previous crashes
  await processPending(deps, options.consumerName, limit);

  while (!signal.aborted) {
    try {
      const response = await deps.redis.xreadgroup(
        'GROUP', GROUP_NAME, options.consumerName,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', STREAM_KEY,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      const entries = parseReadReply(response);
      await Promise.all(
        entries.map(([streamId, fields]) => limit(() => processEntry(deps, streamId, fields))),
      );
    } catch (err: unknown) {
      if (signal.aborted) break;
      deps.log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  deps.log.info('Consumer stopped');
}

/**
 * Processes pending (previously delivered but unacknowledged) entries.
 * This handles recovery after a crash or restart.
 *
 * The PEL is read in pages of `BATCH_SIZE`, each page starting after the
 * last ID of the previous one, until a page comes back empty. Entries that
 * fail again stay pending and are skipped, so the walk always ends.
 *
 * @returns Number of live entries processed.
 */
export async function processPending(
  deps: PendingDeps,
  consumerName: string,
  limit: Limiter,
): Promise<number> {
  deps.log.info('Checking for pending entries...');

  let lastId = '0';
  let recovered = 0;

  while (true) {
    const response = await deps.redis.xreadgroup(
      'GROUP', GROUP_NAME, consumerName,
      'COUNT', BATCH_SIZE,
      'STREAMS', STREAM_KEY,
      lastId,  // an ID (not '>') re-reads this consumer's pending entries after it
    );

    const page = parseReadReply(response);
    const last = page[page.length - 1];
    if (last === undefined) break;
    lastId = last[0];

    // nil entries were deleted from the stream; acknowledge them so they leave the PEL
    const deleted = page.filter(([, fields]) => fields.length === 0).map(([streamId]) => streamId);
    if (deleted.length > 0) {
      await deps.redis.xack(STREAM_KEY, GROUP_NAME, ...deleted);
    }

    const live = page.filter(([, fields]) => fields.length > 0);
    await Promise.all(live.map(([streamId, fields]) => limit(() => processEntry(deps, streamId, fields))));
    recovered += live.length;
  }

  if (recovered > 0) {
    deps.log.info({ count: recovered }, 'Recovered pending entries');
  }
  return recovered;
}

/**
 * Processes a single stream entry: parse → reconcile → finalise handle → ACK.
 *
 * Never throws: every failure is logged here. On an unexpected error the
 * entry is not acknowledged and stays in the PEL for redelivery.
 */
export async function processEntry(
  deps: EntryDeps,
  streamId: string,
  fields: string[],
): Promise<void> {
  const entry = parseStreamEntry(fields);

  try {
    const status = await processEnvelope(deps.pipeline, entry.envelope, entry.handle_id);

    const finalized = await deps.tracking.finalize(entry.handle_id, status);
    if (!finalized) {
      deps.log.debug({ handle_id: entry.handle_id, streamId }, 'Tracking handle missing or already final');
    }

    // ACK only after the handle carries the outcome
    await deps.redis.xack(STREAM_KEY, GROUP_NAME, streamId);
  } catch (err: unknown) {
    // Do NOT ack: message stays in pending list for redelivery
    deps.log.error({ err, handle_id: entry.handle_id, streamId }, 'Failed to process entry');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
