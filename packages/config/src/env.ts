import { z } from "zod";
import type { AppConfig } from "@docchat/types";

function positiveInt(defaultValue: number) {
  return z.string().default(String(defaultValue)).transform(Number).pipe(z.number().int().positive());
}

function nonNegativeInt(defaultValue: number) {
  return z
    .string()
    .default(String(defaultValue))
    .transform(Number)
    .pipe(z.number().int().nonnegative());
}

/**
 * Zod schema for all environment variables the services read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: positiveInt(10),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().min(1).default("http://localhost:6333"),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z
      .string()
      .regex(/^[a-zA-Z0-9_-]+$/, "QDRANT_COLLECTION may only contain letters, digits, _ and -")
      .default("docchat_chunks"),
    VECTOR_INDEX_CAPACITY: positiveInt(1_000_000),

    // ---------- Credentials ----------
    CREDENTIAL_ENCRYPTION_KEY: z
      .string()
      .length(32, "CREDENTIAL_ENCRYPTION_KEY must be exactly 32 characters"),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["fixed", "recursive"]).default("recursive"),
    CHUNK_SIZE_TOKENS: positiveInt(500),
    CHUNK_OVERLAP_TOKENS: nonNegativeInt(50),

    // ---------- Pipeline ----------
    MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),
    PIPELINE_CONCURRENCY: positiveInt(4),
    EMBEDDING_BATCH_SIZE: positiveInt(64),
    PIPELINE_STALLED_AFTER_MS: positiveInt(600_000),

    // ---------- Providers ----------
    PROVIDER_TIMEOUT_MS: positiveInt(30_000),
    PROVIDER_MAX_RETRIES: nonNegativeInt(3),
    PROVIDER_RETRY_BASE_MS: positiveInt(500),
    PROVIDER_RETRY_MAX_MS: positiveInt(8_000),

    // ---------- Retrieval ----------
    RETRIEVAL_TOP_K: positiveInt(5),
    RETRIEVAL_MAX_TOP_K: positiveInt(20),

    // ---------- Chat ----------
    CHAT_CONTEXT_WINDOW_TOKENS: positiveInt(8_192),
    CHAT_ANSWER_RESERVE_TOKENS: nonNegativeInt(1_024),
    CHAT_HISTORY_MAX_TOKENS: nonNegativeInt(2_000),
    CHAT_CONTEXT_FORMAT: z.enum(["auto", "xml", "markdown", "plain"]).default("auto"),
  })
  .refine((env) => env.CHUNK_OVERLAP_TOKENS < env.CHUNK_SIZE_TOKENS, {
    message: "CHUNK_OVERLAP_TOKENS must be smaller than CHUNK_SIZE_TOKENS",
    path: ["CHUNK_OVERLAP_TOKENS"],
  })
  .refine((env) => env.RETRIEVAL_TOP_K <= env.RETRIEVAL_MAX_TOP_K, {
    message: "RETRIEVAL_TOP_K must not exceed RETRIEVAL_MAX_TOP_K",
    path: ["RETRIEVAL_TOP_K"],
  })
  .refine((env) => env.PROVIDER_RETRY_BASE_MS <= env.PROVIDER_RETRY_MAX_MS, {
    message: "PROVIDER_RETRY_BASE_MS must not exceed PROVIDER_RETRY_MAX_MS",
    path: ["PROVIDER_RETRY_BASE_MS"],
  })
  .refine((env) => env.CHAT_ANSWER_RESERVE_TOKENS < env.CHAT_CONTEXT_WINDOW_TOKENS, {
    message: "CHAT_ANSWER_RESERVE_TOKENS must be smaller than CHAT_CONTEXT_WINDOW_TOKENS",
    path: ["CHAT_ANSWER_RESERVE_TOKENS"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      collectionPrefix: parsed.QDRANT_COLLECTION,
      capacity: parsed.VECTOR_INDEX_CAPACITY,
    },

    credentials: {
      encryptionKey: parsed.CREDENTIAL_ENCRYPTION_KEY,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      maxTokens: parsed.CHUNK_SIZE_TOKENS,
      overlap: parsed.CHUNK_OVERLAP_TOKENS,
    },

    pipeline: {
      concurrency: parsed.PIPELINE_CONCURRENCY,
      maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
      embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
      stalledAfterMs: parsed.PIPELINE_STALLED_AFTER_MS,
    },

    provider: {
      timeoutMs: parsed.PROVIDER_TIMEOUT_MS,
      maxRetries: parsed.PROVIDER_MAX_RETRIES,
      retryBaseDelayMs: parsed.PROVIDER_RETRY_BASE_MS,
      retryMaxDelayMs: parsed.PROVIDER_RETRY_MAX_MS,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      maxTopK: parsed.RETRIEVAL_MAX_TOP_K,
    },

    chat: {
      contextWindowTokens: parsed.CHAT_CONTEXT_WINDOW_TOKENS,
      answerReserveTokens: parsed.CHAT_ANSWER_RESERVE_TOKENS,
      historyMaxTokens: parsed.CHAT_HISTORY_MAX_TOKENS,
      contextFormat: parsed.CHAT_CONTEXT_FORMAT,
    },
  };
}
