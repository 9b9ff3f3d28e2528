import { randomUUID } from "node:crypto";
import { pgTable, text, timestamp, jsonb, integer, pgEnum, index } from "drizzle-orm/pg-core";
import { customType } from "drizzle-orm/pg-core";
import type { ProcessingError } from "@docchat/types";

export const processingStateEnum = pgEnum("processing_state", [
  "uploaded",
  "extracting",
  "chunking",
  "embedding",
  "indexed",
  "failed",
]);

const bytea = customType<{ data: Uint8Array; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver(value) {
    return new Uint8Array(value);
  },
});

export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    ownerId: text("owner_id").notNull(),
    filename: text("filename").notNull(),
    mimeType: text("mime_type").notNull(),
    sizeBytes: integer("size_bytes").notNull(),
    state: processingStateEnum("state").notNull().default("uploaded"),
    error: jsonb("error").$type<ProcessingError>(),
    chunkCount: integer("chunk_count").notNull().default(0),
    embeddingModel: text("embedding_model"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ownerStateIdx: index("documents_owner_state_idx").on(table.ownerId, table.state),
  }),
);

/** Original upload bytes, kept apart so listing documents never loads them. */
export const documentContents = pgTable("document_contents", {
  documentId: text("document_id")
    .primaryKey()
    .references(() => documents.id, { onDelete: "cascade" }),
  content: bytea("content").notNull(),
});
