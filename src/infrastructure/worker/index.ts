export { startConsumer, processEntry, processPending, parseStreamEntry, parseReadReply, GROUP_NAME } from './stream-consumer.js';
export type { ConsumerDeps, EntryDeps, PendingDeps, ConsumerOptions, StreamEntry } from './stream-consumer.js';
export { InProcessExecutionBoundary } from './in-process-boundary.js';
