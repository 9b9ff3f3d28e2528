import type { VectorStoreSettings } from "@docchat/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import { InMemoryVectorIndex } from "./memory-index.js";
import { QdrantVectorIndex } from "./qdrant-index.js";

export type {
  IVectorIndex,
  RankedCandidate,
  VectorRecord,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-index.interface.js";
export { clampTopK, compareCandidates } from "./vector-index.interface.js";
export { cosineSimilarity } from "./cosine.js";
export { InMemoryVectorIndex } from "./memory-index.js";
export { QdrantVectorIndex, collectionName } from "./qdrant-index.js";
export type { QdrantIndexConfig } from "./qdrant-index.js";

export function createVectorIndex(settings: VectorStoreSettings, maxTopK: number): IVectorIndex {
  switch (settings.type) {
    case "memory":
      return new InMemoryVectorIndex(maxTopK, settings.capacity);
    case "qdrant":
      return new QdrantVectorIndex({
        url: settings.qdrantUrl,
        apiKey: settings.qdrantApiKey,
        collectionPrefix: settings.collectionPrefix,
        maxTopK,
      });
    default:
      throw new Error(`Unknown vector store type: ${String(settings.type)}`);
  }
}
