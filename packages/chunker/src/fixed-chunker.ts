import type { ChunkResult } from "@docchat/types";
import type { ChunkWindowConfig, IChunker } from "./chunker.interface.js";
import { defaultTokenizer } from "./tokenizer.js";
import type { ITokenizer } from "./tokenizer.js";
import { buildWindows } from "./windows.js";

/**
 * Fixed token-count windows chunker.
 * Every chunk but the last holds exactly `maxTokens` tokens.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  constructor(private readonly tokenizer: ITokenizer = defaultTokenizer) {}

  chunk(content: string, config: ChunkWindowConfig): ChunkResult[] {
    return buildWindows(content, config, this.tokenizer, (_tokens, _start, _minEnd, hardEnd) => hardEnd);
  }
}
