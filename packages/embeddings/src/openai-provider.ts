import OpenAI from "openai";
import type { EmbedOptions } from "@docchat/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const MAX_BATCH_SIZE = 2048; // OpenAI input array limit

const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  /** Shortened output size; only the text-embedding-3 models accept it. */
  dimensions?: number;
  baseURL?: string;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions: number | null;
  readonly maxBatchSize = MAX_BATCH_SIZE;
  private readonly requestedDimensions: number | undefined;
  private client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    // Retries are handled by ResilientEmbeddingProvider.
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.requestedDimensions = config.dimensions;
    this.dimensions = config.dimensions ?? KNOWN_DIMENSIONS[this.model] ?? null;
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: texts,
        encoding_format: "float",
        ...(this.requestedDimensions !== undefined ? { dimensions: this.requestedDimensions } : {}),
      },
      { signal: options?.signal },
    );

    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
