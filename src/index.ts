import Fastify from 'fastify';
import { sql } from 'drizzle-orm';

import {
  dbPlugin,
  redisPlugin,
  loadConfig,
  retryPolicyFrom,
  PostgresReconciliationStore,
  RedisExecutionBoundary,
  InProcessExecutionBoundary,
} from './infrastructure/index.js';
import type { ExecutionBoundary } from './application/index.js';
import { pipelinePlugin, registerRoutes } from './interfaces/http/index.js';
import type { HealthCheck } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration
 * 2) Infrastructure plugins
 * 3) Execution boundary (Redis stream, or in-process pool)
 * 4) HTTP routes
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, { databaseUrl: config.DATABASE_URL });

  const store = new PostgresReconciliationStore(fastify.db);
  const healthChecks: Record<string, HealthCheck> = {
    postgres: () => fastify.db.execute(sql`SELECT 1`),
  };

  let boundary: ExecutionBoundary;

  if (config.EXECUTION_MODE === 'inline') {
    boundary = new InProcessExecutionBoundary(
      { store, reader: store, log: fastify.log, retry: retryPolicyFrom(config) },
      config.WORKER_CONCURRENCY,
    );
    fastify.log.info({ concurrency: config.WORKER_CONCURRENCY }, 'Reconciling in-process');
  } else {
    await fastify.register(redisPlugin, {
      redisUrl: config.REDIS_URL,
      trackingTtlSeconds: config.TRACKING_TTL_SECONDS,
    });
    boundary = new RedisExecutionBoundary(fastify.redis, fastify.tracking);
    healthChecks['redis'] = () => fastify.redis.ping();
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(pipelinePlugin, { boundary, analytics: store, healthChecks });
  await registerRoutes(fastify);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
