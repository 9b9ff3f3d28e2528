import type { DocumentRepository, ScoredChunk } from "@docchat/types";
import { EmbeddingModelMismatchError } from "@docchat/errors";
import type { IVectorIndex } from "@docchat/vector-store";
import { embeddingModelKey } from "@docchat/embeddings";
import type { Logger } from "@docchat/logger";
import type { ProviderRegistry } from "./provider-registry.js";

export interface RetrievalRequest {
  ownerId: string;
  /** Session scope; `null` searches every indexed document of the owner. */
  documentIds: string[] | null;
  query: string;
  topK: number;
  signal?: AbortSignal;
}

export interface RetrievalDependencies {
  documents: DocumentRepository;
  vectorIndex: IVectorIndex;
  providers: ProviderRegistry;
  logger?: Logger;
}

/**
 * Query -> Embed -> Vector Search -> Hydrate.
 *
 * Only documents that are `indexed` right now are searched. An empty scope
 * returns no chunks without touching the embedding provider. Documents
 * embedded with another model than the owner's current one are skipped, and
 * when that leaves nothing to search the caller gets an
 * `EmbeddingModelMismatchError` instead of an empty result.
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
): Promise<ScoredChunk[]> {
  const scope = await deps.documents.listIndexedIds(request.ownerId, request.documentIds);
  if (scope.length === 0 || request.topK <= 0) {
    deps.logger?.debug({ ownerId: request.ownerId }, "No indexed documents in scope");
    return [];
  }

  const provider = await deps.providers.embeddingFor(request.ownerId);
  const embeddingModel = embeddingModelKey(provider);
  const scoped = await deps.documents.getMany(scope);
  const searchable = scoped.filter((d) => d.embeddingModel === embeddingModel).map((d) => d.id);
  if (searchable.length < scoped.length) {
    const stale = [
      ...new Set(
        scoped
          .filter((d) => d.embeddingModel !== embeddingModel)
          .map((d) => d.embeddingModel ?? "unknown"),
      ),
    ];
    if (searchable.length === 0) {
      throw new EmbeddingModelMismatchError(embeddingModel, stale);
    }
    deps.logger?.warn(
      { ownerId: request.ownerId, skipped: scoped.length - searchable.length, indexedWith: stale },
      "Skipping documents indexed with another embedding model",
    );
  }

  const [vector] = await provider.embed([request.query], {
    inputType: "query",
    signal: request.signal,
  });
  if (!vector) {
    throw new Error("Embedding provider returned no vector for the query");
  }

  const hits = await deps.vectorIndex.search({
    ownerId: request.ownerId,
    documentIds: searchable,
    vector,
    embeddingModel,
    topK: request.topK,
  });
  if (hits.length === 0) {
    return [];
  }

  const chunks = await deps.documents.getChunks(hits.map((h) => h.chunkId));
  const chunkById = new Map(chunks.map((c) => [c.id, c]));
  const filenameById = new Map(scoped.map((d) => [d.id, d.filename]));

  // A hit whose chunk is gone was deleted after the search; drop it.
  return hits.flatMap((hit): ScoredChunk[] => {
    const chunk = chunkById.get(hit.chunkId);
    const filename = filenameById.get(hit.documentId);
    if (!chunk || filename === undefined) return [];
    return [
      {
        chunkId: hit.chunkId,
        documentId: hit.documentId,
        filename,
        chunkIndex: chunk.index,
        content: chunk.text,
        tokenCount: chunk.tokenCount,
        score: hit.score,
      },
    ];
  });
}
