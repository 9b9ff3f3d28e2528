import { and, asc, desc, eq, inArray } from "drizzle-orm";
import type {
  ChunkRecord,
  DocumentListFilter,
  DocumentRecord,
  DocumentRepository,
  NewDocument,
  ProcessingState,
  TransitionChanges,
} from "@docchat/types";
import type { Database } from "../client.js";
import { chunks, documentContents, documents } from "../schema/index.js";
import { toChunkRecord, toChunkRow, toDocumentRecord } from "./mappers.js";

/** Keeps a multi-row insert well under the 65535 bind-parameter limit. */
const CHUNK_INSERT_BATCH = 1_000;

export class DrizzleDocumentRepository implements DocumentRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewDocument, content: Uint8Array): Promise<DocumentRecord> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(documents)
        .values({
          ownerId: input.ownerId,
          filename: input.filename,
          mimeType: input.mimeType,
          sizeBytes: input.sizeBytes,
        })
        .returning();
      if (!row) {
        throw new Error("Insert into documents returned no row");
      }
      await tx.insert(documentContents).values({ documentId: row.id, content });
      return toDocumentRecord(row);
    });
  }

  async get(id: string): Promise<DocumentRecord | null> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    return row ? toDocumentRecord(row) : null;
  }

  async getMany(ids: string[]): Promise<DocumentRecord[]> {
    if (ids.length === 0) return [];
    const rows = await this.db.select().from(documents).where(inArray(documents.id, ids));
    return rows.map(toDocumentRecord);
  }

  async getContent(id: string): Promise<Uint8Array | null> {
    const [row] = await this.db
      .select({ content: documentContents.content })
      .from(documentContents)
      .where(eq(documentContents.documentId, id))
      .limit(1);
    return row ? row.content : null;
  }

  async listByOwner(ownerId: string, filter?: DocumentListFilter): Promise<DocumentRecord[]> {
    const conditions = [eq(documents.ownerId, ownerId)];
    if (filter?.state) {
      conditions.push(eq(documents.state, filter.state));
    }
    const rows = await this.db
      .select()
      .from(documents)
      .where(and(...conditions))
      .orderBy(desc(documents.createdAt), asc(documents.id));
    return rows.map(toDocumentRecord);
  }

  async listIndexedIds(ownerId: string, documentIds: string[] | null): Promise<string[]> {
    if (documentIds !== null && documentIds.length === 0) return [];
    const conditions = [eq(documents.ownerId, ownerId), eq(documents.state, "indexed")];
    if (documentIds !== null) {
      conditions.push(inArray(documents.id, documentIds));
    }
    const rows = await this.db
      .select({ id: documents.id })
      .from(documents)
      .where(and(...conditions))
      .orderBy(asc(documents.createdAt));
    return rows.map((r) => r.id);
  }

  async transition(
    id: string,
    from: ProcessingState,
    to: ProcessingState,
    changes: TransitionChanges = {},
  ): Promise<DocumentRecord | null> {
    return this.db.transaction(async (tx) => {
      const replacing = changes.chunks !== undefined || changes.clearChunks === true;
      const [row] = await tx
        .update(documents)
        .set({
          state: to,
          updatedAt: new Date(),
          ...(changes.error !== undefined ? { error: changes.error } : {}),
          ...(changes.embeddingModel !== undefined ? { embeddingModel: changes.embeddingModel } : {}),
          ...(replacing ? { chunkCount: changes.chunks?.length ?? 0 } : {}),
        })
        .where(and(eq(documents.id, id), eq(documents.state, from)))
        .returning();
      if (!row) {
        return null;
      }

      if (replacing) {
        await tx.delete(chunks).where(eq(chunks.documentId, id));
        const rows = (changes.chunks ?? []).map(toChunkRow);
        for (let i = 0; i < rows.length; i += CHUNK_INSERT_BATCH) {
          await tx.insert(chunks).values(rows.slice(i, i + CHUNK_INSERT_BATCH));
        }
      }
      return toDocumentRecord(row);
    });
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(eq(chunks.documentId, documentId))
      .orderBy(asc(chunks.index));
    return rows.map(toChunkRecord);
  }

  async getChunks(chunkIds: string[]): Promise<ChunkRecord[]> {
    if (chunkIds.length === 0) return [];
    const rows = await this.db.select().from(chunks).where(inArray(chunks.id, chunkIds));
    return rows.map(toChunkRecord);
  }

  async delete(id: string): Promise<boolean> {
    // chunks and document_contents cascade
    const rows = await this.db.delete(documents).where(eq(documents.id, id)).returning({ id: documents.id });
    return rows.length > 0;
  }
}
