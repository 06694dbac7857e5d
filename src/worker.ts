import { Redis } from 'ioredis';
import { createDbClient, ensureSchema, PostgresReconciliationStore } from './infrastructure/db/index.js';
import { RedisTrackingStore } from './infrastructure/redis/index.js';
import { startConsumer } from './infrastructure/worker/index.js';
import { loadConfig, retryPolicyFrom } from './infrastructure/config.js';
import { createLogger } from './shared/logger.js';

/**
 * Standalone worker process that consumes submitted envelopes from the
 * Redis Stream and reconciles them into PostgreSQL.
 *
 * Runs independently of the Fastify HTTP server and can be scaled
 * horizontally by launching multiple instances with different WORKER_ID
 * values. Per-job exclusion lives in Postgres, so workers share nothing.
 */
const config = loadConfig();
const log = createLogger(config.LOG_LEVEL, 'worker');

const redis = new Redis(config.REDIS_URL, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

// One connection per concurrent reconciliation plus one for reads.
const { sql, db } = createDbClient(config.DATABASE_URL, config.WORKER_CONCURRENCY + 1);

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql);
  log.info('Database ready (jobs + task_events + idempotency_records tables)');

  const store = new PostgresReconciliationStore(db);

  await startConsumer(
    {
      redis,
      tracking: new RedisTrackingStore(redis, config.TRACKING_TTL_SECONDS),
      pipeline: { store, reader: store, log, retry: retryPolicyFrom(config) },
      log,
    },
    { consumerName: config.WORKER_ID, concurrency: config.WORKER_CONCURRENCY },
    ac.signal,
  );
}

async function closeConnections(): Promise<void> {
  await redis.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
  await sql.end().catch((err: unknown) => log.warn({ err }, 'Database close failed'));
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give in-flight operations a moment, then force exit
  setTimeout(() => {
    void closeConnections().finally(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
