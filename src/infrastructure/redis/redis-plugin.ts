import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import { STREAM_KEY } from './event-producer.js';
import { RedisTrackingStore } from './tracking-store.js';

export interface RedisPluginOptions {
  redisUrl: string;
  /** Lifetime of a tracking handle. */
  trackingTtlSeconds: number;
}

/**
 * API-side Redis: the connection used to queue envelopes and the tracking
 * store that answers `GET /tasks/:task_id`.
 *
 * Commands fail after one reconnect attempt so that `POST /ingest` can
 * answer 503 instead of hanging while Redis is down. The worker opens its
 * own connection with unlimited retries for blocking reads.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.redisUrl, {
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    fastify.log.error({ err }, 'Redis connection error');
  });

  await redis.connect();
  fastify.log.info({ stream: STREAM_KEY, trackingTtlSeconds: opts.trackingTtlSeconds }, 'Redis connected');

  fastify.decorate('redis', redis);
  fastify.decorate('tracking', new RedisTrackingStore(redis, opts.trackingTtlSeconds));

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
    tracking: RedisTrackingStore;
  }
}
