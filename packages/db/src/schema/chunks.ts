import { pgTable, text, timestamp, integer, uniqueIndex } from "drizzle-orm/pg-core";
import { documents } from "./documents.js";

export const chunks = pgTable(
  "chunks",
  {
    id: text("id").primaryKey(),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    ownerId: text("owner_id").notNull(),
    index: integer("index").notNull(),
    text: text("text").notNull(),
    tokenCount: integer("token_count").notNull(),
    startChar: integer("start_char").notNull(),
    endChar: integer("end_char").notNull(),
    startToken: integer("start_token").notNull(),
    endToken: integer("end_token").notNull(),
    overlapTokens: integer("overlap_tokens").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIndexIdx: uniqueIndex("chunks_document_index_idx").on(table.documentId, table.index),
  }),
);
