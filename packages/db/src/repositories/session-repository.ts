import { asc, desc, eq, sql } from "drizzle-orm";
import type {
  ChatSession,
  ChatSessionSummary,
  Message,
  MessageDraft,
  NewChatSession,
  SessionPatch,
  SessionRepository,
} from "@docchat/types";
import { NotFoundError } from "@docchat/errors";
import type { Database } from "../client.js";
import { chatSessions, messages } from "../schema/index.js";
import { toChatSession, toMessage } from "./mappers.js";

export const DEFAULT_SESSION_TITLE = "New chat";

export class DrizzleSessionRepository implements SessionRepository {
  constructor(private readonly db: Database) {}

  async create(ownerId: string, input: NewChatSession): Promise<ChatSession> {
    const [row] = await this.db
      .insert(chatSessions)
      .values({
        ownerId,
        title: input.title ?? DEFAULT_SESSION_TITLE,
        documentIds: input.documentIds ?? null,
        chatModel: input.chatModel ?? null,
      })
      .returning();
    if (!row) {
      throw new Error("Insert into chat_sessions returned no row");
    }
    return toChatSession(row);
  }

  async get(id: string): Promise<ChatSession | null> {
    const [row] = await this.db.select().from(chatSessions).where(eq(chatSessions.id, id)).limit(1);
    return row ? toChatSession(row) : null;
  }

  async listByOwner(ownerId: string): Promise<ChatSessionSummary[]> {
    const rows = await this.db
      .select({
        session: chatSessions,
        messageCount: sql<number>`(select count(*)::int from ${messages} where ${messages.sessionId} = ${chatSessions.id})`,
        lastMessage: sql<
          string | null
        >`(select ${messages.text} from ${messages} where ${messages.sessionId} = ${chatSessions.id} order by ${messages.ordinal} desc limit 1)`,
      })
      .from(chatSessions)
      .where(eq(chatSessions.ownerId, ownerId))
      .orderBy(desc(chatSessions.updatedAt), asc(chatSessions.id));

    return rows.map((row) => ({
      ...toChatSession(row.session),
      messageCount: row.messageCount,
      lastMessage: row.lastMessage,
    }));
  }

  async update(id: string, patch: SessionPatch): Promise<ChatSession | null> {
    const [row] = await this.db
      .update(chatSessions)
      .set({
        updatedAt: new Date(),
        ...(patch.title !== undefined ? { title: patch.title } : {}),
        ...(patch.documentIds !== undefined ? { documentIds: patch.documentIds } : {}),
        ...(patch.chatModel !== undefined ? { chatModel: patch.chatModel } : {}),
      })
      .where(eq(chatSessions.id, id))
      .returning();
    return row ? toChatSession(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    // messages cascade
    const rows = await this.db
      .delete(chatSessions)
      .where(eq(chatSessions.id, id))
      .returning({ id: chatSessions.id });
    return rows.length > 0;
  }

  async appendMessage(sessionId: string, draft: MessageDraft): Promise<Message> {
    return this.db.transaction(async (tx) => {
      // Row lock serialises ordinal allocation across processes.
      const [session] = await tx
        .select({ id: chatSessions.id })
        .from(chatSessions)
        .where(eq(chatSessions.id, sessionId))
        .for("update");
      if (!session) {
        throw new NotFoundError(`Chat session ${sessionId} not found`);
      }

      const [last] = await tx
        .select({ ordinal: messages.ordinal })
        .from(messages)
        .where(eq(messages.sessionId, sessionId))
        .orderBy(desc(messages.ordinal))
        .limit(1);

      const [row] = await tx
        .insert(messages)
        .values({
          sessionId,
          role: draft.role,
          text: draft.text,
          ordinal: last ? last.ordinal + 1 : 0,
          status: draft.status ?? "complete",
          errorKind: draft.errorKind ?? null,
          citations: draft.citations ?? [],
        })
        .returning();
      if (!row) {
        throw new Error("Insert into messages returned no row");
      }
      await tx.update(chatSessions).set({ updatedAt: row.createdAt }).where(eq(chatSessions.id, sessionId));
      return toMessage(row);
    });
  }

  async listMessages(sessionId: string): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(eq(messages.sessionId, sessionId))
      .orderBy(asc(messages.ordinal));
    return rows.map(toMessage);
  }
}
