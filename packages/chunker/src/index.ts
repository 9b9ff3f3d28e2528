export type { IChunker, ChunkWindowConfig } from "./chunker.interface.js";
export { RecursiveChunker } from "./recursive-chunker.js";
export type { Boundary } from "./recursive-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";
export { WordTokenizer, defaultTokenizer } from "./tokenizer.js";
export type { ITokenizer, TokenSpan } from "./tokenizer.js";
export { reconstructText, validateWindowConfig } from "./windows.js";
