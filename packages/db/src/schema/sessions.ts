import { randomUUID } from "node:crypto";
import { pgTable, text, timestamp, jsonb, integer, pgEnum, index, uniqueIndex } from "drizzle-orm/pg-core";
import type { Citation, ErrorKind } from "@docchat/types";

export const messageRoleEnum = pgEnum("message_role", ["user", "assistant"]);
export const messageStatusEnum = pgEnum("message_status", ["complete", "partial", "error"]);

export const chatSessions = pgTable(
  "chat_sessions",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    ownerId: text("owner_id").notNull(),
    title: text("title").notNull(),
    // null: every indexed document of the owner
    documentIds: jsonb("document_ids").$type<string[]>(),
    chatModel: text("chat_model"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ownerIdx: index("chat_sessions_owner_idx").on(table.ownerId, table.updatedAt),
  }),
);

export const messages = pgTable(
  "messages",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    sessionId: text("session_id")
      .notNull()
      .references(() => chatSessions.id, { onDelete: "cascade" }),
    role: messageRoleEnum("role").notNull(),
    text: text("text").notNull(),
    ordinal: integer("ordinal").notNull(),
    status: messageStatusEnum("status").notNull().default("complete"),
    errorKind: text("error_kind").$type<ErrorKind>(),
    citations: jsonb("citations").notNull().$type<Citation[]>().default([]),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sessionOrdinalIdx: uniqueIndex("messages_session_ordinal_idx").on(table.sessionId, table.ordinal),
  }),
);
