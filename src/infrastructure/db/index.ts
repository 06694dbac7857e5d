export { jobs, taskEvents, idempotencyRecords } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient, Executor } from './client.js';
export { ensureSchema } from './migrate.js';
export { PostgresReconciliationStore } from './reconciliation-store.js';
export { isTransientStorageError, toStorageError } from './storage-errors.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
