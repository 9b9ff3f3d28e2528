import type { AppConfig, DocumentJobDispatcher } from "@docchat/types";
import {
  DrizzleCredentialSource,
  DrizzleDocumentRepository,
  DrizzleModelPreferenceSource,
  DrizzleSessionRepository,
  createDbClient,
} from "@docchat/db";
import type { DbClient } from "@docchat/db";
import { EncryptedCredentialProvider } from "@docchat/crypto";
import { createVectorIndex } from "@docchat/vector-store";
import type { IVectorIndex } from "@docchat/vector-store";
import { BullMqDispatcher, createIngestQueue, parseRedisConnection } from "@docchat/queue";
import type { IngestQueue } from "@docchat/queue";
import { ChatOrchestrator, ConfiguredProviderRegistry, DocumentPipeline } from "@docchat/core";
import type { ProviderRegistry } from "@docchat/core";
import type { Logger } from "@docchat/logger";
import { createChildLogger } from "@docchat/logger";

export interface Runtime {
  db: DbClient;
  vectorIndex: IVectorIndex;
  providers: ProviderRegistry;
  queue: IngestQueue;
  dispatcher: DocumentJobDispatcher;
  pipeline: DocumentPipeline;
  orchestrator: ChatOrchestrator;
  close(): Promise<void>;
}

/**
 * Composition root. Everything that talks to Postgres, Qdrant, Redis or a
 * model provider is created here and nowhere else.
 */
export function buildRuntime(config: AppConfig, logger: Logger): Runtime {
  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  const documents = new DrizzleDocumentRepository(db.db);
  const sessions = new DrizzleSessionRepository(db.db);
  const vectorIndex = createVectorIndex(config.vectorStore, config.retrieval.maxTopK);

  const providers = new ConfiguredProviderRegistry({
    preferences: new DrizzleModelPreferenceSource(db.db),
    credentials: new EncryptedCredentialProvider(
      new DrizzleCredentialSource(db.db),
      config.credentials.encryptionKey,
      createChildLogger(logger, { component: "credentials" }),
    ),
    resilience: { ...config.provider, logger: createChildLogger(logger, { component: "providers" }) },
    embeddingBatchSize: config.pipeline.embeddingBatchSize,
  });

  const queue = createIngestQueue({ connection: parseRedisConnection(config.redis.url) });
  const dispatcher = new BullMqDispatcher(queue, createChildLogger(logger, { component: "queue" }));

  const pipeline = new DocumentPipeline({
    documents,
    vectorIndex,
    providers,
    dispatcher,
    chunking: config.chunking,
    maxUploadBytes: config.pipeline.maxUploadBytes,
    stalledAfterMs: config.pipeline.stalledAfterMs,
    logger: createChildLogger(logger, { component: "pipeline" }),
  });

  const orchestrator = new ChatOrchestrator({
    sessions,
    documents,
    vectorIndex,
    providers,
    settings: { ...config.chat, topK: config.retrieval.topK },
    logger: createChildLogger(logger, { component: "chat" }),
  });

  return {
    db,
    vectorIndex,
    providers,
    queue,
    dispatcher,
    pipeline,
    orchestrator,
    close: async () => {
      await queue.close();
      await db.close();
    },
  };
}
