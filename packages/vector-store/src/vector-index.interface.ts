import type { VectorRecord, VectorSearchParams, VectorSearchResult } from "@docchat/types";

export type { VectorRecord, VectorSearchParams, VectorSearchResult };

/**
 * Nearest-neighbour index over chunk vectors. Records are written hidden and
 * become searchable only once `publish` is called for their document.
 */
export interface IVectorIndex {
  upsert(records: VectorRecord[]): Promise<void>;
  /** Makes every vector of the document visible to `search`. */
  publish(documentId: string): Promise<void>;
  /**
   * Cosine similarity, highest first. Equal scores are ordered by lower chunk
   * index, then earlier document creation, then chunk id.
   */
  search(params: VectorSearchParams): Promise<VectorSearchResult[]>;
  /** Returns the number of vectors removed. */
  deleteByDocument(documentId: string): Promise<number>;
  count(): Promise<number>;
}

export interface RankedCandidate extends VectorSearchResult {
  documentCreatedAt: number;
}

export function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
  return (
    b.score - a.score ||
    a.chunkIndex - b.chunkIndex ||
    a.documentCreatedAt - b.documentCreatedAt ||
    (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0)
  );
}

/** Clamps a requested k into `[0, maxTopK]`. */
export function clampTopK(topK: number, maxTopK: number): number {
  if (!Number.isFinite(topK) || topK <= 0) {
    return 0;
  }
  return Math.min(Math.floor(topK), maxTopK);
}
