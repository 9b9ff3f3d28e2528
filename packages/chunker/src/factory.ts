import type { ChunkStrategy } from "@docchat/types";
import type { IChunker } from "./chunker.interface.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { FixedChunker } from "./fixed-chunker.js";
import type { ITokenizer } from "./tokenizer.js";

export function createChunker(strategy: ChunkStrategy, tokenizer?: ITokenizer): IChunker {
  switch (strategy) {
    case "recursive":
      return new RecursiveChunker(tokenizer);
    case "fixed":
      return new FixedChunker(tokenizer);
    default:
      throw new Error(`Unknown chunking strategy: ${String(strategy)}`);
  }
}
