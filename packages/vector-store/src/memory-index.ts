import type { VectorRecord, VectorSearchParams, VectorSearchResult } from "@docchat/types";
import { DimensionMismatchError, ResourceExhaustedError } from "@docchat/errors";
import type { IVectorIndex, RankedCandidate } from "./vector-index.interface.js";
import { clampTopK, compareCandidates } from "./vector-index.interface.js";
import { cosineSimilarity } from "./cosine.js";

/**
 * Exact in-process index. Used by tests and single-node deployments; every
 * search scans the stored vectors of the requested model.
 */
export class InMemoryVectorIndex implements IVectorIndex {
  private readonly records = new Map<string, VectorRecord>();
  /** Dimensionality is fixed per embedding model once the first vector lands. */
  private readonly dimensions = new Map<string, number>();

  constructor(
    private readonly maxTopK: number,
    private readonly capacity: number = Number.POSITIVE_INFINITY,
  ) {}

  async upsert(records: VectorRecord[]): Promise<void> {
    const pending = new Map<string, number>();
    let added = 0;
    for (const record of records) {
      const expected = this.dimensions.get(record.embeddingModel) ?? pending.get(record.embeddingModel);
      if (expected === undefined) {
        pending.set(record.embeddingModel, record.vector.length);
      } else if (expected !== record.vector.length) {
        throw new DimensionMismatchError(expected, record.vector.length, record.embeddingModel);
      }
      if (!this.records.has(record.chunkId)) {
        added++;
      }
    }

    if (this.records.size + added > this.capacity) {
      throw new ResourceExhaustedError(
        `Vector index is full (capacity ${String(this.capacity)} vectors)`,
        "vector-index",
        { details: { capacity: this.capacity, requested: added } },
      );
    }

    for (const [model, size] of pending) {
      this.dimensions.set(model, size);
    }
    for (const record of records) {
      this.records.set(record.chunkId, { ...record, vector: [...record.vector] });
    }
  }

  async publish(documentId: string): Promise<void> {
    for (const record of this.records.values()) {
      if (record.documentId === documentId) {
        record.visible = true;
      }
    }
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const expected = this.dimensions.get(params.embeddingModel);
    if (expected !== undefined && expected !== params.vector.length) {
      throw new DimensionMismatchError(expected, params.vector.length, params.embeddingModel);
    }

    const topK = clampTopK(params.topK, this.maxTopK);
    if (topK === 0 || params.documentIds.length === 0) {
      return [];
    }

    const scope = new Set(params.documentIds);
    const candidates: RankedCandidate[] = [];
    for (const record of this.records.values()) {
      if (
        !record.visible ||
        record.ownerId !== params.ownerId ||
        record.embeddingModel !== params.embeddingModel ||
        !scope.has(record.documentId)
      ) {
        continue;
      }
      candidates.push({
        chunkId: record.chunkId,
        documentId: record.documentId,
        chunkIndex: record.chunkIndex,
        score: cosineSimilarity(params.vector, record.vector),
        documentCreatedAt: record.documentCreatedAt.getTime(),
      });
    }

    return candidates
      .sort(compareCandidates)
      .slice(0, topK)
      .map(({ chunkId, documentId, chunkIndex, score }) => ({ chunkId, documentId, chunkIndex, score }));
  }

  async deleteByDocument(documentId: string): Promise<number> {
    let removed = 0;
    for (const [chunkId, record] of this.records) {
      if (record.documentId === documentId) {
        this.records.delete(chunkId);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
