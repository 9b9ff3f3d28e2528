export * from "./schema/index.js";
export { createDbClient } from "./client.js";
export type { Database, DbClient, DbClientOptions } from "./client.js";
export { DrizzleDocumentRepository } from "./repositories/document-repository.js";
export { DrizzleSessionRepository, DEFAULT_SESSION_TITLE } from "./repositories/session-repository.js";
export { DrizzleModelPreferenceSource, DrizzleCredentialSource } from "./repositories/account-sources.js";
export {
  toChatSession,
  toChunkRecord,
  toChunkRow,
  toDocumentRecord,
  toMessage,
} from "./repositories/mappers.js";
export {
  InMemoryDocumentRepository,
  InMemorySessionRepository,
  StaticModelPreferenceSource,
} from "./memory.js";
