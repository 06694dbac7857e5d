export { redisPlugin, enqueueEnvelope, RedisTrackingStore, RedisExecutionBoundary } from './redis/index.js';
export type { RedisPluginOptions, TrackingRecord } from './redis/index.js';
export {
  createDbClient,
  ensureSchema,
  PostgresReconciliationStore,
  dbPlugin,
} from './db/index.js';
export type { Database, DbPluginOptions } from './db/index.js';
export { startConsumer, InProcessExecutionBoundary } from './worker/index.js';
export { InMemoryReconciliationStore } from './memory/in-memory-store.js';
export { loadConfig, retryPolicyFrom } from './config.js';
export type { AppConfig } from './config.js';
