import { describe, it, expect, vi } from "vitest";
import type { ChunkRecord, EmbedOptions, VectorRecord } from "@docchat/types";
import { EmbeddingModelMismatchError } from "@docchat/errors";
import { InMemoryDocumentRepository } from "@docchat/db";
import { InMemoryVectorIndex } from "@docchat/vector-store";
import type { IEmbeddingProvider } from "@docchat/embeddings";
import { retrieve } from "./retrieval.js";
import type { ProviderRegistry } from "./provider-registry.js";

const MODEL = "openai:test-embed";

class FixedQueryEmbedder implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model = "test-embed";
  readonly dimensions = 2;
  readonly maxBatchSize = 100;

  readonly embed = vi.fn((texts: string[], _options?: EmbedOptions) =>
    Promise.resolve(texts.map(() => [1, 0])),
  );
}

function chunkRecord(documentId: string, ownerId: string, index: number, text: string): ChunkRecord {
  const tokens = text.split(" ").length;
  return {
    id: `${documentId}-c${String(index)}`,
    documentId,
    ownerId,
    index,
    text,
    tokenCount: tokens,
    startChar: 0,
    endChar: text.length,
    startToken: 0,
    endToken: tokens,
    overlapTokens: 0,
  };
}

/**
 * Stores a document straight in `indexed` (or leaves it mid-pipeline) with one
 * published vector per chunk.
 */
async function seed(
  documents: InMemoryDocumentRepository,
  index: InMemoryVectorIndex,
  options: {
    ownerId: string;
    filename: string;
    vectors: number[][];
    indexed?: boolean;
    embeddingModel?: string;
  },
): Promise<string> {
  const doc = await documents.create(
    { ownerId: options.ownerId, filename: options.filename, mimeType: "text/plain", sizeBytes: 1 },
    new Uint8Array([1]),
  );
  const chunks = options.vectors.map((_, i) =>
    chunkRecord(doc.id, options.ownerId, i, `${options.filename} part ${String(i)}`),
  );
  await documents.transition(doc.id, "uploaded", "extracting");
  await documents.transition(doc.id, "extracting", "chunking");
  await documents.transition(doc.id, "chunking", "embedding", { chunks });

  const records: VectorRecord[] = chunks.map((chunk, i) => ({
    chunkId: chunk.id,
    documentId: doc.id,
    ownerId: options.ownerId,
    chunkIndex: chunk.index,
    documentCreatedAt: doc.createdAt,
    embeddingModel: options.embeddingModel ?? MODEL,
    vector: options.vectors[i] ?? [],
    visible: false,
  }));
  await index.upsert(records);
  if (options.indexed ?? true) {
    await index.publish(doc.id);
    await documents.transition(doc.id, "embedding", "indexed", {
      embeddingModel: options.embeddingModel ?? MODEL,
    });
  }
  return doc.id;
}

function setup() {
  const documents = new InMemoryDocumentRepository();
  const vectorIndex = new InMemoryVectorIndex(20);
  const embedder = new FixedQueryEmbedder();
  const providers: ProviderRegistry = {
    embeddingFor: vi.fn(() => Promise.resolve(embedder)),
    completionFor: () => Promise.reject(new Error("not used")),
  };
  return { documents, vectorIndex, embedder, providers, deps: { documents, vectorIndex, providers } };
}

describe("retrieve", () => {
  it("returns nothing without calling the provider when no document is indexed", async () => {
    const { documents, vectorIndex, embedder, providers, deps } = setup();
    await seed(documents, vectorIndex, {
      ownerId: "owner-1",
      filename: "pending.txt",
      vectors: [[1, 0]],
      indexed: false,
    });

    const result = await retrieve(
      { ownerId: "owner-1", documentIds: null, query: "anything", topK: 5 },
      deps,
    );

    expect(result).toEqual([]);
    expect(providers.embeddingFor).not.toHaveBeenCalled();
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it("returns nothing for topK 0", async () => {
    const { documents, vectorIndex, embedder, deps } = setup();
    await seed(documents, vectorIndex, { ownerId: "owner-1", filename: "a.txt", vectors: [[1, 0]] });

    expect(
      await retrieve({ ownerId: "owner-1", documentIds: null, query: "q", topK: 0 }, deps),
    ).toEqual([]);
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it("embeds the query and hydrates the best chunks", async () => {
    const { documents, vectorIndex, embedder, deps } = setup();
    const id = await seed(documents, vectorIndex, {
      ownerId: "owner-1",
      filename: "guide.md",
      vectors: [
        [0, 1],
        [1, 0],
        [1, 1],
      ],
    });

    const result = await retrieve(
      { ownerId: "owner-1", documentIds: null, query: "how do I start", topK: 2 },
      deps,
    );

    expect(embedder.embed).toHaveBeenCalledWith(["how do I start"], {
      inputType: "query",
      signal: undefined,
    });
    expect(result.map((c) => [c.chunkIndex, c.content, c.filename, c.documentId])).toEqual([
      [1, "guide.md part 1", "guide.md", id],
      [2, "guide.md part 2", "guide.md", id],
    ]);
    expect(result[0]?.score).toBeCloseTo(1);
    expect(result[1]?.score).toBeCloseTo(Math.SQRT1_2);
    expect(result[0]?.tokenCount).toBe(3);
  });

  it("searches only the session's documents", async () => {
    const { documents, vectorIndex, deps } = setup();
    await seed(documents, vectorIndex, { ownerId: "owner-1", filename: "a.txt", vectors: [[1, 0]] });
    const b = await seed(documents, vectorIndex, {
      ownerId: "owner-1",
      filename: "b.txt",
      vectors: [[1, 0]],
    });

    const result = await retrieve(
      { ownerId: "owner-1", documentIds: [b], query: "q", topK: 5 },
      deps,
    );

    expect(result.map((c) => c.filename)).toEqual(["b.txt"]);
  });

  it("never returns another owner's chunks", async () => {
    const { documents, vectorIndex, deps } = setup();
    const foreign = await seed(documents, vectorIndex, {
      ownerId: "owner-2",
      filename: "secret.txt",
      vectors: [[1, 0]],
    });

    expect(
      await retrieve({ ownerId: "owner-1", documentIds: [foreign], query: "q", topK: 5 }, deps),
    ).toEqual([]);
  });

  it("skips documents that are still being processed", async () => {
    const { documents, vectorIndex, deps } = setup();
    await seed(documents, vectorIndex, {
      ownerId: "owner-1",
      filename: "pending.txt",
      vectors: [[1, 0]],
      indexed: false,
    });
    await seed(documents, vectorIndex, { ownerId: "owner-1", filename: "ready.txt", vectors: [[0, 1]] });

    const result = await retrieve(
      { ownerId: "owner-1", documentIds: null, query: "q", topK: 5 },
      deps,
    );

    expect(result.map((c) => c.filename)).toEqual(["ready.txt"]);
  });

  it("rejects a scope indexed only with another embedding model", async () => {
    const { documents, vectorIndex, embedder, deps } = setup();
    await seed(documents, vectorIndex, {
      ownerId: "owner-1",
      filename: "old.txt",
      vectors: [[1, 0, 0]],
      embeddingModel: "openai:small",
    });

    const error: unknown = await retrieve(
      { ownerId: "owner-1", documentIds: null, query: "q", topK: 5 },
      deps,
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingModelMismatchError);
    expect(error).toMatchObject({
      kind: "dimension-mismatch",
      current: MODEL,
      indexedWith: ["openai:small"],
    });
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it("searches the documents that match the current model and skips the rest", async () => {
    const { documents, vectorIndex, deps } = setup();
    await seed(documents, vectorIndex, {
      ownerId: "owner-1",
      filename: "old.txt",
      vectors: [[1, 0, 0]],
      embeddingModel: "openai:small",
    });
    await seed(documents, vectorIndex, { ownerId: "owner-1", filename: "new.txt", vectors: [[1, 0]] });

    const result = await retrieve(
      { ownerId: "owner-1", documentIds: null, query: "q", topK: 5 },
      deps,
    );

    expect(result.map((c) => c.filename)).toEqual(["new.txt"]);
  });
});
