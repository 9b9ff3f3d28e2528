import { GoogleGenAI } from "@google/genai";
import type { EmbedOptions } from "@docchat/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-004";
const MAX_BATCH_SIZE = 100; // batchEmbedContents limit

const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-004": 768,
  "gemini-embedding-001": 3072,
};

export interface GoogleEmbeddingConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/** Model ids are addressed as `models/<id>`; accept either form. */
export function withModelsPrefix(model: string): string {
  return model.startsWith("models/") ? model : `models/${model}`;
}

export class GoogleEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "google";
  readonly model: string;
  readonly dimensions: number | null;
  readonly maxBatchSize = MAX_BATCH_SIZE;
  private readonly requestedDimensions: number | undefined;
  private client: GoogleGenAI;

  constructor(config: GoogleEmbeddingConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = (config.model ?? DEFAULT_MODEL).replace(/^models\//, "");
    this.requestedDimensions = config.dimensions;
    this.dimensions = config.dimensions ?? KNOWN_DIMENSIONS[this.model] ?? null;
  }

  async embed(texts: string[], options?: EmbedOptions): Promise<number[][]> {
    if (texts.length === 0) return [];

    const result = await this.client.models.embedContent({
      model: withModelsPrefix(this.model),
      contents: texts,
      config: {
        taskType: options?.inputType === "query" ? "RETRIEVAL_QUERY" : "RETRIEVAL_DOCUMENT",
        outputDimensionality: this.requestedDimensions,
        abortSignal: options?.signal,
      },
    });

    return (result.embeddings ?? []).map((embedding) => embedding.values ?? []);
  }
}
