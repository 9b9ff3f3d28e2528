import { CohereClient } from "cohere-ai";
import type { EmbedOptions } from "@docchat/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

const KNOWN_DIMENSIONS: Record<string, number> = {
  "embed-v4.0": 1536,
  "embed-english-v3.0": 1024,
  "embed-multilingual-v3.0": 1024,
  "embed-english-light-v3.0": 384,
  "embed-multilingual-light-v3.0": 384,
};

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  /** Expected output size when the model is not one of the known ones. */
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number | null;
  readonly maxBatchSize = BATCH_SIZE;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? KNOWN_DIMENSIONS[this.model] ?? null;
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.v2.embed(
      {
        texts,
        model: this.model,
        inputType: options?.inputType === "query" ? "search_query" : "search_document",
        embeddingTypes: ["float"],
      },
      { abortSignal: options?.signal, maxRetries: 0 },
    );

    return response.embeddings.float ?? [];
  }
}
