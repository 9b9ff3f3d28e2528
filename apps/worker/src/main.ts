import { Worker } from "bullmq";
import { QUEUE_NAMES, parseRedisConnection } from "@docchat/queue";
import type { IngestJobData } from "@docchat/types";
import { parseEnv } from "@docchat/config";
import { describeError } from "@docchat/errors";
import { createLogger } from "@docchat/logger";
import { buildRuntime } from "./container.js";
import { processIngest } from "./processors/ingest.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "docchat-worker" });
  const runtime = buildRuntime(config, logger);
  const shutdownController = new AbortController();

  const worker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    async (job) => {
      await processIngest(job.data, runtime.pipeline, logger, shutdownController.signal);
    },
    { connection: parseRedisConnection(config.redis.url), concurrency: config.pipeline.concurrency },
  );

  worker.on("failed", (job, error) => {
    logger.error({ jobId: job?.id, error: error.message }, "Ingest job failed");
  });
  worker.on("error", (error) => {
    logger.error({ error: error.message }, "Worker error");
  });

  logger.info(
    { queue: QUEUE_NAMES.INGEST, concurrency: config.pipeline.concurrency },
    "Worker started",
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");
    shutdownController.abort();
    try {
      await worker.close();
      await runtime.close();
      logger.info("Worker stopped");
      process.exit(0);
    } catch (error) {
      logger.error({ error: describeError(error).message }, "Shutdown failed");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", err);
  process.exit(1);
});
