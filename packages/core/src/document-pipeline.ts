import { randomUUID } from "node:crypto";
import type {
  ChunkRecord,
  ChunkingSettings,
  DocumentJobDispatcher,
  DocumentRecord,
  DocumentRepository,
  DocumentStatus,
  DocumentUpload,
  ProcessingState,
  TransitionChanges,
  VectorRecord,
} from "@docchat/types";
import { SUPPORTED_MIME_TYPES } from "@docchat/types";
import {
  AppError,
  ConflictError,
  EmptyDocumentError,
  NotFoundError,
  UnsupportedTypeError,
  ValidationError,
  describeError,
} from "@docchat/errors";
import type { IParser } from "@docchat/parser";
import { getParser, isSupportedMimeType, normalizeMimeType, sanitizeText } from "@docchat/parser";
import type { IChunker } from "@docchat/chunker";
import { createChunker } from "@docchat/chunker";
import type { IVectorIndex } from "@docchat/vector-store";
import { embeddingModelKey } from "@docchat/embeddings";
import type { Logger } from "@docchat/logger";
import { createChildLogger, createSilentLogger, describeText } from "@docchat/logger";
import type { ProviderRegistry } from "./provider-registry.js";
import { assertTransition, isSettled } from "./state-machine.js";

export interface DocumentPipelineDeps {
  documents: DocumentRepository;
  vectorIndex: IVectorIndex;
  providers: ProviderRegistry;
  dispatcher: DocumentJobDispatcher;
  chunking: ChunkingSettings;
  maxUploadBytes: number;
  logger?: Logger;
  /** Defaults to the chunker of `chunking.strategy`. */
  chunker?: IChunker;
  parserFor?: (mimeType: string) => IParser;
  /**
   * How long a document may sit in `extracting`, `chunking` or `embedding`
   * before it counts as interrupted. Defaults to ten minutes.
   */
  stalledAfterMs?: number;
}

const DEFAULT_STALLED_AFTER_MS = 10 * 60_000;

export interface ProcessOptions {
  signal?: AbortSignal;
}

/**
 * Ingestion state machine: Uploaded -> Extracting -> Chunking -> Embedding -> Indexed.
 *
 * Each stage commits its output together with the state change. Vectors are
 * written hidden and published before the final transition, and retrieval
 * only searches documents that are `indexed`, so a document is either fully
 * searchable or not at all. Processing failures are recorded on the document
 * and never thrown from `process`.
 */
export class DocumentPipeline {
  private readonly logger: Logger;
  private readonly chunker: IChunker;
  private readonly parserFor: (mimeType: string) => IParser;

  constructor(private readonly deps: DocumentPipelineDeps) {
    this.logger = deps.logger ?? createSilentLogger();
    this.chunker = deps.chunker ?? createChunker(deps.chunking.strategy);
    this.parserFor = deps.parserFor ?? getParser;
  }

  /** Stores the upload in `uploaded` and schedules processing. */
  async submit(content: Uint8Array, upload: DocumentUpload): Promise<string> {
    const mimeType = normalizeMimeType(upload.mimeType);
    if (!isSupportedMimeType(mimeType)) {
      throw new UnsupportedTypeError(upload.mimeType, SUPPORTED_MIME_TYPES);
    }
    const filename = upload.filename.trim();
    if (filename.length === 0) {
      throw new ValidationError("A filename is required", { filename: "required" });
    }
    if (upload.ownerId.length === 0) {
      throw new ValidationError("An owner is required", { ownerId: "required" });
    }
    if (content.byteLength > this.deps.maxUploadBytes) {
      throw new ValidationError(
        `File exceeds the upload limit of ${String(this.deps.maxUploadBytes)} bytes`,
        { content: "too large" },
        { details: { sizeBytes: content.byteLength, maxUploadBytes: this.deps.maxUploadBytes } },
      );
    }

    const document = await this.deps.documents.create(
      { ownerId: upload.ownerId, filename, mimeType, sizeBytes: content.byteLength },
      content,
    );
    const log = createChildLogger(this.logger, { documentId: document.id });
    log.info({ mimeType, sizeBytes: document.sizeBytes }, "Document accepted");

    await this.schedule(document.id, log);
    return document.id;
  }

  /**
   * Runs every stage for a document in `uploaded`. Documents in any other
   * state are left alone, so a duplicate job is harmless.
   */
  async process(documentId: string, options: ProcessOptions = {}): Promise<void> {
    const log = createChildLogger(this.logger, { documentId });
    const claimed = await this.deps.documents.transition(documentId, "uploaded", "extracting", {
      error: null,
    });
    if (!claimed) {
      // A redelivered job for a worker that died mid-run finds the document
      // stuck in an intermediate state.
      if (!(await this.recoverInterrupted(documentId))) {
        log.debug("Document is not waiting for processing, skipping");
      }
      return;
    }

    const startTime = Date.now();
    let state: ProcessingState = "extracting";
    try {
      // Phase 1: Extract
      const text = await this.extract(claimed);
      state = await this.advance(documentId, state, "chunking");

      // Phase 2: Chunk
      const chunks = this.chunk(claimed, text);
      state = await this.advance(documentId, state, "embedding", { chunks });
      log.info({ chunkCount: chunks.length, text: describeText(text) }, "Document chunked");

      // Phase 3: Embed
      const provider = await this.deps.providers.embeddingFor(claimed.ownerId);
      const vectors = await provider.embed(
        chunks.map((c) => c.text),
        { inputType: "document", signal: options.signal },
      );
      if (vectors.length !== chunks.length) {
        throw new AppError({
          message: `Embedding provider returned ${String(vectors.length)} vectors for ${String(chunks.length)} chunks`,
          statusCode: 502,
          code: "EMBEDDING_COUNT_MISMATCH",
        });
      }
      const embeddingModel = embeddingModelKey(provider);

      // Phase 4: Store hidden, publish, then mark indexed
      const records: VectorRecord[] = chunks.map((chunk, i) => ({
        chunkId: chunk.id,
        documentId,
        ownerId: claimed.ownerId,
        chunkIndex: chunk.index,
        documentCreatedAt: claimed.createdAt,
        embeddingModel,
        vector: vectors[i] ?? [],
        visible: false,
      }));
      await this.deps.vectorIndex.upsert(records);
      await this.deps.vectorIndex.publish(documentId);
      state = await this.advance(documentId, state, "indexed", { embeddingModel });

      log.info(
        { chunkCount: chunks.length, embeddingModel, durationMs: Date.now() - startTime },
        "Document indexed",
      );
    } catch (error) {
      await this.fail(documentId, state, error, log);
    }
  }

  /** Last committed state. Never waits for processing in flight. */
  async getStatus(documentId: string): Promise<DocumentStatus> {
    const document = await this.getDocument(documentId);
    if (document.state === "failed") {
      return {
        state: "failed",
        error: document.error ?? { kind: "internal", message: "Processing failed" },
      };
    }
    return { state: document.state, error: null };
  }

  async getDocument(documentId: string): Promise<DocumentRecord> {
    const document = await this.deps.documents.get(documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }
    return document;
  }

  listDocuments(ownerId: string, state?: ProcessingState): Promise<DocumentRecord[]> {
    return this.deps.documents.listByOwner(ownerId, state ? { state } : undefined);
  }

  /** Removes vectors first, then the record with its chunks and bytes. */
  async delete(documentId: string): Promise<void> {
    await this.getDocument(documentId);
    const removed = await this.deps.vectorIndex.deleteByDocument(documentId);
    await this.deps.documents.delete(documentId);
    this.logger.info({ documentId, vectorsRemoved: removed }, "Document deleted");
  }

  /**
   * Starts over from the stored bytes, for example after the owner switched
   * embedding provider. Only settled documents can be reprocessed.
   */
  async reprocess(documentId: string): Promise<void> {
    let document = await this.getDocument(documentId);
    if (await this.recoverInterrupted(documentId)) {
      document = await this.getDocument(documentId);
    }
    assertTransition(document.state, "uploaded");

    await this.deps.vectorIndex.deleteByDocument(documentId);
    const reset = await this.deps.documents.transition(documentId, document.state, "uploaded", {
      clearChunks: true,
      error: null,
      embeddingModel: null,
    });
    if (!reset) {
      throw new ConflictError(`Document ${documentId} changed state, try again`);
    }

    const log = createChildLogger(this.logger, { documentId });
    log.info({ from: document.state }, "Document queued for reprocessing");
    await this.schedule(documentId, log);
  }

  /**
   * Fails a document whose processing stopped without reaching `indexed` or
   * `failed`, so the owner can reprocess it. Returns false when the document
   * is not in an intermediate state or was updated within the stall window.
   */
  async recoverInterrupted(documentId: string): Promise<boolean> {
    const document = await this.getDocument(documentId);
    if (document.state === "uploaded" || isSettled(document.state)) {
      return false;
    }
    const idleMs = Math.max(0, Date.now() - document.updatedAt.getTime());
    if (idleMs < (this.deps.stalledAfterMs ?? DEFAULT_STALLED_AFTER_MS)) {
      return false;
    }

    const log = createChildLogger(this.logger, { documentId });
    await this.deps.vectorIndex.deleteByDocument(documentId);
    const failed = await this.deps.documents.transition(documentId, document.state, "failed", {
      error: { kind: "internal", message: "processing interrupted" },
      clearChunks: true,
      embeddingModel: null,
    });
    if (failed) {
      log.warn({ stage: document.state, idleMs }, "Interrupted document marked as failed");
    }
    return failed !== null;
  }

  private async extract(document: DocumentRecord): Promise<string> {
    const content = await this.deps.documents.getContent(document.id);
    if (!content) {
      throw new NotFoundError(`Content of document ${document.id} is missing`);
    }
    const parsed = await this.parserFor(document.mimeType).parse(content, document.mimeType);
    const text = sanitizeText(parsed.text);
    if (text.length === 0) {
      throw new EmptyDocumentError();
    }
    return text;
  }

  private chunk(document: DocumentRecord, text: string): ChunkRecord[] {
    const results = this.chunker.chunk(text, {
      maxTokens: this.deps.chunking.maxTokens,
      overlap: this.deps.chunking.overlap,
    });
    if (results.length === 0) {
      throw new EmptyDocumentError();
    }
    return results.map((result) => ({
      id: randomUUID(),
      documentId: document.id,
      ownerId: document.ownerId,
      index: result.index,
      text: result.content,
      tokenCount: result.tokenCount,
      ...result.metadata,
    }));
  }

  private async advance(
    documentId: string,
    from: ProcessingState,
    to: ProcessingState,
    changes?: TransitionChanges,
  ): Promise<ProcessingState> {
    assertTransition(from, to);
    const updated = await this.deps.documents.transition(documentId, from, to, changes);
    if (!updated) {
      throw new ConflictError(`Document ${documentId} left state ${from} during processing`);
    }
    return to;
  }

  private async fail(
    documentId: string,
    from: ProcessingState,
    error: unknown,
    log: Logger,
  ): Promise<void> {
    const { kind, message } = describeError(error);
    log.warn({ stage: from, kind, error: message }, "Document processing failed");

    try {
      await this.deps.vectorIndex.deleteByDocument(documentId);
      const failed = await this.deps.documents.transition(documentId, from, "failed", {
        error: { kind, message },
        clearChunks: true,
        embeddingModel: null,
      });
      if (!failed) {
        log.info({ stage: from }, "Document was removed or changed while processing");
      }
    } catch (cleanupError) {
      log.error(
        { stage: from, error: describeError(cleanupError).message },
        "Could not record processing failure",
      );
    }
  }

  private async schedule(documentId: string, log: Logger): Promise<void> {
    try {
      await this.deps.dispatcher.dispatch(documentId);
    } catch (error) {
      const { message } = describeError(error);
      log.error({ error: message }, "Could not schedule document processing");
      await this.deps.documents.transition(documentId, "uploaded", "failed", {
        error: { kind: "internal", message: `Could not schedule processing: ${message}` },
      });
    }
  }
}
