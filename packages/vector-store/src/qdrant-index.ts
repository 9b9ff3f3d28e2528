import { QdrantClient } from "@qdrant/js-client-rest";
import type { VectorRecord, VectorSearchParams, VectorSearchResult } from "@docchat/types";
import { DimensionMismatchError } from "@docchat/errors";
import type { IVectorIndex, RankedCandidate } from "./vector-index.interface.js";
import { clampTopK, compareCandidates } from "./vector-index.interface.js";

const BATCH_SIZE = 100;
/** Extra hits fetched so equal scores at the cut-off can be re-ordered. */
const OVERFETCH = 16;

export interface QdrantIndexConfig {
  url: string;
  apiKey?: string;
  /** Collections are named `<prefix>_<provider>_<model>`. */
  collectionPrefix: string;
  maxTopK: number;
}

export function collectionName(prefix: string, embeddingModel: string): string {
  return `${prefix}_${embeddingModel.replace(/[^A-Za-z0-9_-]/g, "_")}`;
}

function readString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === "string" ? value : "";
}

function readNumber(payload: Record<string, unknown>, key: string): number {
  const value = payload[key];
  return typeof value === "number" ? value : 0;
}

/**
 * One Qdrant collection per embedding model. Points are written with
 * `visible: false` and flipped by `publish`, so a half-indexed document never
 * shows up in search.
 */
export class QdrantVectorIndex implements IVectorIndex {
  private client: QdrantClient;
  private readonly prefix: string;
  private readonly maxTopK: number;
  /** Vector size per collection, filled lazily. */
  private readonly sizes = new Map<string, number | null>();

  constructor(config: QdrantIndexConfig) {
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey });
    this.prefix = config.collectionPrefix;
    this.maxTopK = config.maxTopK;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    const byModel = new Map<string, VectorRecord[]>();
    for (const record of records) {
      const group = byModel.get(record.embeddingModel) ?? [];
      group.push(record);
      byModel.set(record.embeddingModel, group);
    }

    for (const [model, group] of byModel) {
      const first = group[0];
      if (!first) continue;
      const collection = collectionName(this.prefix, model);
      const size = await this.ensureCollection(collection, first.vector.length);
      for (const record of group) {
        if (record.vector.length !== size) {
          throw new DimensionMismatchError(size, record.vector.length, model);
        }
      }

      // Process in batches
      for (let i = 0; i < group.length; i += BATCH_SIZE) {
        const batch = group.slice(i, i + BATCH_SIZE);
        await this.client.upsert(collection, {
          wait: true,
          points: batch.map((r) => ({
            id: r.chunkId,
            vector: r.vector,
            payload: {
              chunkId: r.chunkId,
              documentId: r.documentId,
              ownerId: r.ownerId,
              chunkIndex: r.chunkIndex,
              documentCreatedAt: r.documentCreatedAt.getTime(),
              visible: r.visible,
            },
          })),
        });
      }
    }
  }

  async publish(documentId: string): Promise<void> {
    for (const collection of await this.listCollections()) {
      await this.client.setPayload(collection, {
        wait: true,
        payload: { visible: true },
        filter: { must: [{ key: "documentId", match: { value: documentId } }] },
      });
    }
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = collectionName(this.prefix, params.embeddingModel);
    const size = await this.collectionSize(collection);
    if (size === null) {
      return [];
    }
    if (size !== params.vector.length) {
      throw new DimensionMismatchError(size, params.vector.length, params.embeddingModel);
    }

    const topK = clampTopK(params.topK, this.maxTopK);
    if (topK === 0 || params.documentIds.length === 0) {
      return [];
    }

    const hits = await this.client.search(collection, {
      vector: params.vector,
      limit: topK + OVERFETCH,
      with_payload: true,
      filter: {
        must: [
          { key: "ownerId", match: { value: params.ownerId } },
          { key: "visible", match: { value: true } },
          { key: "documentId", match: { any: params.documentIds } },
        ],
      },
    });

    const candidates: RankedCandidate[] = hits.map((hit) => {
      const payload = hit.payload ?? {};
      return {
        chunkId: readString(payload, "chunkId") || String(hit.id),
        documentId: readString(payload, "documentId"),
        chunkIndex: readNumber(payload, "chunkIndex"),
        documentCreatedAt: readNumber(payload, "documentCreatedAt"),
        score: hit.score,
      };
    });

    return candidates
      .sort(compareCandidates)
      .slice(0, topK)
      .map(({ chunkId, documentId, chunkIndex, score }) => ({ chunkId, documentId, chunkIndex, score }));
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const filter = { must: [{ key: "documentId", match: { value: documentId } }] };
    let removed = 0;
    for (const collection of await this.listCollections()) {
      const { count } = await this.client.count(collection, { filter, exact: true });
      if (count > 0) {
        await this.client.delete(collection, { wait: true, filter });
        removed += count;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    let total = 0;
    for (const collection of await this.listCollections()) {
      const { count } = await this.client.count(collection, { exact: true });
      total += count;
    }
    return total;
  }

  private async listCollections(): Promise<string[]> {
    const { collections } = await this.client.getCollections();
    return collections.map((c) => c.name).filter((name) => name.startsWith(`${this.prefix}_`));
  }

  private async collectionSize(collection: string): Promise<number | null> {
    const cached = this.sizes.get(collection);
    if (cached !== undefined && cached !== null) {
      return cached;
    }

    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      return null;
    }
    const info = await this.client.getCollection(collection);
    const vectors = info.config.params.vectors;
    const size = vectors && "size" in vectors && typeof vectors.size === "number" ? vectors.size : null;
    this.sizes.set(collection, size);
    return size;
  }

  private async ensureCollection(collection: string, dimensions: number): Promise<number> {
    const existing = await this.collectionSize(collection);
    if (existing !== null) {
      return existing;
    }

    await this.client.createCollection(collection, {
      vectors: { size: dimensions, distance: "Cosine" },
    });

    // Create payload indexes for filtering
    await this.client.createPayloadIndex(collection, { field_name: "ownerId", field_schema: "keyword" });
    await this.client.createPayloadIndex(collection, { field_name: "documentId", field_schema: "keyword" });
    await this.client.createPayloadIndex(collection, { field_name: "visible", field_schema: "bool" });

    this.sizes.set(collection, dimensions);
    return dimensions;
  }
}
