export { QUEUE_NAMES, createIngestQueue, parseRedisConnection } from "./queues.js";
export type { QueueConfig, IngestQueue } from "./queues.js";
export { BullMqDispatcher } from "./bullmq-dispatcher.js";
export type { JobQueue } from "./bullmq-dispatcher.js";
export { InProcessTaskPool } from "./task-pool.js";
export type { DocumentTask } from "./task-pool.js";
