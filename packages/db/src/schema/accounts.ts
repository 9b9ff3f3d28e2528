import { pgTable, text, timestamp, pgEnum, primaryKey } from "drizzle-orm/pg-core";

/*
 * Both tables are written by the account service. This repository only reads
 * them.
 */

export const providerEnum = pgEnum("provider", ["openai", "google", "cohere"]);
export const completionProviderEnum = pgEnum("completion_provider", ["openai", "google"]);

export const modelPreferences = pgTable("model_preferences", {
  ownerId: text("owner_id").primaryKey(),
  embeddingProvider: providerEnum("embedding_provider").notNull(),
  embeddingModel: text("embedding_model").notNull(),
  completionProvider: completionProviderEnum("completion_provider").notNull(),
  chatModel: text("chat_model").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const providerCredentials = pgTable(
  "provider_credentials",
  {
    ownerId: text("owner_id").notNull(),
    provider: providerEnum("provider").notNull(),
    iv: text("iv").notNull(),
    ciphertext: text("ciphertext").notNull(),
    tag: text("tag").notNull(),
    keyId: text("key_id").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.ownerId, table.provider] }),
  }),
);
