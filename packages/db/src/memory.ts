import { randomUUID } from "node:crypto";
import type {
  ChatSession,
  ChatSessionSummary,
  ChunkRecord,
  DocumentListFilter,
  DocumentRecord,
  DocumentRepository,
  Message,
  MessageDraft,
  ModelPreferenceSource,
  ModelPreferences,
  NewChatSession,
  NewDocument,
  ProcessingState,
  SessionPatch,
  SessionRepository,
  TransitionChanges,
} from "@docchat/types";
import { DEFAULT_MODEL_PREFERENCES } from "@docchat/types";
import { NotFoundError } from "@docchat/errors";
import { DEFAULT_SESSION_TITLE } from "./repositories/session-repository.js";

/** Monotonic clock so records created in one tick still order by time. */
function tick(last: number): Date {
  return new Date(Math.max(Date.now(), last + 1));
}

function copyDocument(record: DocumentRecord): DocumentRecord {
  return { ...record, error: record.error ? { ...record.error } : null };
}

function byCreatedDesc(a: { createdAt: Date; id: string }, b: { createdAt: Date; id: string }): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Process-local `DocumentRepository`. Each call runs to completion without
 * awaiting, which gives `transition` the same all-or-nothing behaviour as the
 * database transaction.
 */
export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly contents = new Map<string, Uint8Array>();
  private readonly chunks = new Map<string, ChunkRecord[]>();
  private lastTime = 0;

  async create(input: NewDocument, content: Uint8Array): Promise<DocumentRecord> {
    const now = this.now();
    const record: DocumentRecord = {
      id: randomUUID(),
      ownerId: input.ownerId,
      filename: input.filename,
      mimeType: input.mimeType,
      sizeBytes: input.sizeBytes,
      state: "uploaded",
      error: null,
      chunkCount: 0,
      embeddingModel: null,
      createdAt: now,
      updatedAt: now,
    };
    this.documents.set(record.id, record);
    this.contents.set(record.id, content.slice());
    return copyDocument(record);
  }

  async get(id: string): Promise<DocumentRecord | null> {
    const record = this.documents.get(id);
    return record ? copyDocument(record) : null;
  }

  async getMany(ids: string[]): Promise<DocumentRecord[]> {
    return ids.flatMap((id) => {
      const record = this.documents.get(id);
      return record ? [copyDocument(record)] : [];
    });
  }

  async getContent(id: string): Promise<Uint8Array | null> {
    const content = this.contents.get(id);
    return content ? content.slice() : null;
  }

  async listByOwner(ownerId: string, filter?: DocumentListFilter): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((d) => d.ownerId === ownerId && (!filter?.state || d.state === filter.state))
      .sort(byCreatedDesc)
      .map(copyDocument);
  }

  async listIndexedIds(ownerId: string, documentIds: string[] | null): Promise<string[]> {
    const scope = documentIds === null ? null : new Set(documentIds);
    return [...this.documents.values()]
      .filter((d) => d.ownerId === ownerId && d.state === "indexed" && (!scope || scope.has(d.id)))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((d) => d.id);
  }

  async transition(
    id: string,
    from: ProcessingState,
    to: ProcessingState,
    changes: TransitionChanges = {},
  ): Promise<DocumentRecord | null> {
    const record = this.documents.get(id);
    if (!record || record.state !== from) {
      return null;
    }

    record.state = to;
    record.updatedAt = this.now();
    if (changes.error !== undefined) {
      record.error = changes.error;
    }
    if (changes.embeddingModel !== undefined) {
      record.embeddingModel = changes.embeddingModel;
    }
    if (changes.chunks !== undefined || changes.clearChunks === true) {
      const next = (changes.chunks ?? []).map((c) => ({ ...c }));
      this.chunks.set(id, next);
      record.chunkCount = next.length;
    }
    return copyDocument(record);
  }

  async listChunks(documentId: string): Promise<ChunkRecord[]> {
    return (this.chunks.get(documentId) ?? [])
      .map((c) => ({ ...c }))
      .sort((a, b) => a.index - b.index);
  }

  async getChunks(chunkIds: string[]): Promise<ChunkRecord[]> {
    const wanted = new Set(chunkIds);
    const found: ChunkRecord[] = [];
    for (const list of this.chunks.values()) {
      for (const chunk of list) {
        if (wanted.has(chunk.id)) {
          found.push({ ...chunk });
        }
      }
    }
    return found;
  }

  async delete(id: string): Promise<boolean> {
    this.contents.delete(id);
    this.chunks.delete(id);
    return this.documents.delete(id);
  }

  private now(): Date {
    const date = tick(this.lastTime);
    this.lastTime = date.getTime();
    return date;
  }
}

export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly messages = new Map<string, Message[]>();
  private lastTime = 0;

  async create(ownerId: string, input: NewChatSession): Promise<ChatSession> {
    const now = this.now();
    const session: ChatSession = {
      id: randomUUID(),
      ownerId,
      title: input.title ?? DEFAULT_SESSION_TITLE,
      documentIds: input.documentIds ? [...input.documentIds] : null,
      chatModel: input.chatModel ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.set(session.id, session);
    this.messages.set(session.id, []);
    return { ...session };
  }

  async get(id: string): Promise<ChatSession | null> {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  async listByOwner(ownerId: string): Promise<ChatSessionSummary[]> {
    return [...this.sessions.values()]
      .filter((s) => s.ownerId === ownerId)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || (a.id < b.id ? -1 : 1))
      .map((s) => {
        const list = this.messages.get(s.id) ?? [];
        return { ...s, messageCount: list.length, lastMessage: list.at(-1)?.text ?? null };
      });
  }

  async update(id: string, patch: SessionPatch): Promise<ChatSession | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    if (patch.title !== undefined) session.title = patch.title;
    if (patch.documentIds !== undefined) {
      session.documentIds = patch.documentIds ? [...patch.documentIds] : null;
    }
    if (patch.chatModel !== undefined) session.chatModel = patch.chatModel;
    session.updatedAt = this.now();
    return { ...session };
  }

  async delete(id: string): Promise<boolean> {
    this.messages.delete(id);
    return this.sessions.delete(id);
  }

  async appendMessage(sessionId: string, draft: MessageDraft): Promise<Message> {
    const session = this.sessions.get(sessionId);
    const list = this.messages.get(sessionId);
    if (!session || !list) {
      throw new NotFoundError(`Chat session ${sessionId} not found`);
    }
    const message: Message = {
      id: randomUUID(),
      sessionId,
      role: draft.role,
      text: draft.text,
      ordinal: list.length,
      status: draft.status ?? "complete",
      errorKind: draft.errorKind ?? null,
      citations: (draft.citations ?? []).map((c) => ({ ...c })),
      createdAt: this.now(),
    };
    list.push(message);
    session.updatedAt = message.createdAt;
    return { ...message };
  }

  async listMessages(sessionId: string): Promise<Message[]> {
    return (this.messages.get(sessionId) ?? []).map((m) => ({ ...m }));
  }

  private now(): Date {
    const date = tick(this.lastTime);
    this.lastTime = date.getTime();
    return date;
  }
}

/** Same preferences for every owner unless overridden per owner. */
export class StaticModelPreferenceSource implements ModelPreferenceSource {
  private readonly overrides = new Map<string, ModelPreferences>();

  constructor(private readonly defaults: ModelPreferences = DEFAULT_MODEL_PREFERENCES) {}

  set(ownerId: string, preferences: ModelPreferences): void {
    this.overrides.set(ownerId, { ...preferences });
  }

  async getPreferences(ownerId: string): Promise<ModelPreferences> {
    return { ...(this.overrides.get(ownerId) ?? this.defaults) };
  }
}
