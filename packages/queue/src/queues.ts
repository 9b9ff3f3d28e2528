import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData } from "@docchat/types";

export const QUEUE_NAMES = {
  // BullMQ rejects ":" in queue names.
  INGEST: "docchat-ingest",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

/** Maps a `redis://` or `rediss://` URL, including its `/db` index, to ioredis options. */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = Number(parsed.pathname.replace(/^\//, "")) || 0;
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db,
    ...(parsed.protocol === "rediss:" ? { tls: {} } : {}),
  };
}

/**
 * A single attempt per job: the pipeline records failures on the document
 * itself, and a new attempt is an explicit reprocess.
 */
export function createIngestQueue(config: QueueConfig): Queue<IngestJobData> {
  return new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

export type IngestQueue = ReturnType<typeof createIngestQueue>;
