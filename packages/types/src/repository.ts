import type { ChunkRecord } from "./chunk.js";
import type {
  DocumentListFilter,
  DocumentRecord,
  ProcessingError,
  ProcessingState,
} from "./document.js";
import type {
  ChatSession,
  ChatSessionSummary,
  Message,
  MessageDraft,
  NewChatSession,
} from "./session.js";

export interface NewDocument {
  ownerId: string;
  filename: string;
  mimeType: string;
  sizeBytes: number;
}

/**
 * Output committed together with a state change. Whatever is set here becomes
 * visible in the same step as the new state.
 */
export interface TransitionChanges {
  /** Replaces every chunk of the document. */
  chunks?: ChunkRecord[];
  /** Removes every chunk of the document. */
  clearChunks?: boolean;
  error?: ProcessingError | null;
  embeddingModel?: string | null;
}

export interface DocumentRepository {
  create(input: NewDocument, content: Uint8Array): Promise<DocumentRecord>;
  get(id: string): Promise<DocumentRecord | null>;
  getMany(ids: string[]): Promise<DocumentRecord[]>;
  getContent(id: string): Promise<Uint8Array | null>;
  listByOwner(ownerId: string, filter?: DocumentListFilter): Promise<DocumentRecord[]>;
  /**
   * Ids of the owner's documents in state `indexed`, optionally restricted to
   * `documentIds`.
   */
  listIndexedIds(ownerId: string, documentIds: string[] | null): Promise<string[]>;
  /**
   * Compare-and-set: applies the change only when the document is currently in
   * `from`. Returns the updated record, or `null` when the document is gone or
   * in another state.
   */
  transition(
    id: string,
    from: ProcessingState,
    to: ProcessingState,
    changes?: TransitionChanges,
  ): Promise<DocumentRecord | null>;
  listChunks(documentId: string): Promise<ChunkRecord[]>;
  getChunks(chunkIds: string[]): Promise<ChunkRecord[]>;
  /** Deletes the document, its content and its chunks. */
  delete(id: string): Promise<boolean>;
}

export interface SessionPatch {
  title?: string;
  documentIds?: string[] | null;
  chatModel?: string | null;
}

export interface SessionRepository {
  create(ownerId: string, input: NewChatSession): Promise<ChatSession>;
  get(id: string): Promise<ChatSession | null>;
  listByOwner(ownerId: string): Promise<ChatSessionSummary[]>;
  update(id: string, patch: SessionPatch): Promise<ChatSession | null>;
  /** Deletes the session and its messages. */
  delete(id: string): Promise<boolean>;
  /** Appends with the next ordinal of the session (0 for the first message). */
  appendMessage(sessionId: string, draft: MessageDraft): Promise<Message>;
  listMessages(sessionId: string): Promise<Message[]>;
}
