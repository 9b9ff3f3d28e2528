import type { EmbedOptions, EmbeddingProviderName } from "@docchat/types";

/**
 * A backend that turns texts into vectors. Output order matches input order,
 * one vector per text, all of the same dimensionality.
 */
export interface IEmbeddingProvider {
  readonly name: EmbeddingProviderName;
  readonly model: string;
  /** Known output size, or `null` until the first response reveals it. */
  readonly dimensions: number | null;
  /** Largest number of texts a single request may carry. */
  readonly maxBatchSize: number;

  embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

/** Vectors are only comparable within one key. */
export function embeddingModelKey(provider: Pick<IEmbeddingProvider, "name" | "model">): string {
  return `${provider.name}:${provider.model}`;
}
