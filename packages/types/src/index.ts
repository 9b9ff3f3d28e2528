export * from "./document.js";
export * from "./chunk.js";
export * from "./pipeline.js";
export * from "./session.js";
export * from "./provider.js";
export * from "./job.js";
export * from "./config.js";
export * from "./repository.js";
