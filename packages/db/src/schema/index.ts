export * from "./documents.js";
export * from "./chunks.js";
export * from "./sessions.js";
export * from "./accounts.js";
