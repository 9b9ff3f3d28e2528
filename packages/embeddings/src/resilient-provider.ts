import type { EmbedOptions } from "@docchat/types";
import {
  DimensionMismatchError,
  PermanentProviderError,
  classifyProviderError,
  withRetry,
  withTimeout,
} from "@docchat/errors";
import type { Logger } from "@docchat/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { embeddingModelKey } from "./embedding-provider.interface.js";

export interface ResilienceOptions {
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  logger?: Logger;
}

export interface ResilientEmbeddingOptions extends ResilienceOptions {
  /** Texts per request; capped at the provider's own limit. */
  batchSize: number;
}

/**
 * Wraps any embedding provider with batching, a per-request timeout,
 * retries for transient failures and validation of what comes back.
 */
export class ResilientEmbeddingProvider implements IEmbeddingProvider {
  readonly name: IEmbeddingProvider["name"];
  readonly model: string;
  readonly maxBatchSize: number;
  private knownDimensions: number | null;

  constructor(
    private readonly inner: IEmbeddingProvider,
    private readonly options: ResilientEmbeddingOptions,
  ) {
    this.name = inner.name;
    this.model = inner.model;
    this.maxBatchSize = inner.maxBatchSize;
    this.knownDimensions = inner.dimensions;
  }

  get dimensions(): number | null {
    return this.knownDimensions;
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    const batchSize = Math.max(1, Math.min(this.options.batchSize, this.inner.maxBatchSize));
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      const result = await this.embedBatch(batch, options);
      this.validate(batch.length, result);
      vectors.push(...result);
    }

    return vectors;
  }

  private embedBatch(batch: string[], options?: EmbedOptions): Promise<number[][]> {
    const { timeoutMs, maxRetries, retryBaseDelayMs, retryMaxDelayMs, logger } = this.options;
    const service = this.name;

    return withRetry(
      () =>
        withTimeout(
          (signal) =>
            this.inner.embed(batch, { ...options, signal }).catch((error: unknown) => {
              throw classifyProviderError(error, service);
            }),
          timeoutMs,
          { service, signal: options?.signal },
        ),
      {
        maxRetries,
        baseDelayMs: retryBaseDelayMs,
        maxDelayMs: retryMaxDelayMs,
        service,
        signal: options?.signal,
        onRetry: ({ attempt, delayMs, error }) => {
          logger?.warn(
            {
              provider: service,
              model: this.model,
              attempt,
              delayMs,
              batchSize: batch.length,
              error: error instanceof Error ? error.message : String(error),
            },
            "Embedding request failed, retrying",
          );
        },
      },
    );
  }

  private validate(expectedCount: number, vectors: number[][]): void {
    if (vectors.length !== expectedCount) {
      throw new PermanentProviderError(
        `${this.name} returned ${String(vectors.length)} vectors for ${String(expectedCount)} inputs`,
        this.name,
        "bad-request",
      );
    }
    for (const vector of vectors) {
      const expected = this.knownDimensions ?? vector.length;
      if (vector.length === 0 || vector.length !== expected) {
        throw new DimensionMismatchError(expected, vector.length, `${embeddingModelKey(this)} embedding`);
      }
      this.knownDimensions = expected;
    }
  }
}
