import type { ChunkStrategy } from "./chunk.js";
import type { ContextFormat } from "./provider.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  vectorStore: VectorStoreSettings;
  credentials: CredentialConfig;
  chunking: ChunkingSettings;
  pipeline: PipelineSettings;
  provider: ProviderSettings;
  retrieval: RetrievalSettings;
  chat: ChatSettings;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface VectorStoreSettings {
  type: "qdrant" | "memory";
  qdrantUrl: string;
  qdrantApiKey?: string;
  collectionPrefix: string;
  capacity: number;
}

export interface CredentialConfig {
  encryptionKey: string;
}

export interface ChunkingSettings {
  strategy: ChunkStrategy;
  maxTokens: number;
  overlap: number;
}

export interface PipelineSettings {
  concurrency: number;
  maxUploadBytes: number;
  embeddingBatchSize: number;
  /** Time in an intermediate state after which a document counts as interrupted. */
  stalledAfterMs: number;
}

export interface ProviderSettings {
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface RetrievalSettings {
  topK: number;
  maxTopK: number;
}

export interface ChatSettings {
  contextWindowTokens: number;
  answerReserveTokens: number;
  historyMaxTokens: number;
  contextFormat: ContextFormat | "auto";
}
