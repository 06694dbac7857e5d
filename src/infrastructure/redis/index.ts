export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { enqueueEnvelope, STREAM_KEY } from './event-producer.js';
export { RedisTrackingStore } from './tracking-store.js';
export type { TrackingRecord } from './tracking-store.js';
export { RedisExecutionBoundary } from './redis-boundary.js';
