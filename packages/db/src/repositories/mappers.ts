import type { ChatSession, ChunkRecord, DocumentRecord, Message } from "@docchat/types";
import type { chatSessions, chunks, documents, messages } from "../schema/index.js";

type DocumentRow = typeof documents.$inferSelect;
type ChunkRow = typeof chunks.$inferSelect;
type ChunkInsert = typeof chunks.$inferInsert;
type SessionRow = typeof chatSessions.$inferSelect;
type MessageRow = typeof messages.$inferSelect;

export function toDocumentRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    ownerId: row.ownerId,
    filename: row.filename,
    mimeType: row.mimeType,
    sizeBytes: row.sizeBytes,
    state: row.state,
    error: row.error,
    chunkCount: row.chunkCount,
    embeddingModel: row.embeddingModel,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toChunkRecord(row: ChunkRow): ChunkRecord {
  return {
    id: row.id,
    documentId: row.documentId,
    ownerId: row.ownerId,
    index: row.index,
    text: row.text,
    tokenCount: row.tokenCount,
    startChar: row.startChar,
    endChar: row.endChar,
    startToken: row.startToken,
    endToken: row.endToken,
    overlapTokens: row.overlapTokens,
  };
}

export function toChunkRow(record: ChunkRecord): ChunkInsert {
  return {
    id: record.id,
    documentId: record.documentId,
    ownerId: record.ownerId,
    index: record.index,
    text: record.text,
    tokenCount: record.tokenCount,
    startChar: record.startChar,
    endChar: record.endChar,
    startToken: record.startToken,
    endToken: record.endToken,
    overlapTokens: record.overlapTokens,
  };
}

export function toChatSession(row: SessionRow): ChatSession {
  return {
    id: row.id,
    ownerId: row.ownerId,
    title: row.title,
    documentIds: row.documentIds,
    chatModel: row.chatModel,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    sessionId: row.sessionId,
    role: row.role,
    text: row.text,
    ordinal: row.ordinal,
    status: row.status,
    errorKind: row.errorKind,
    citations: row.citations,
    createdAt: row.createdAt,
  };
}
