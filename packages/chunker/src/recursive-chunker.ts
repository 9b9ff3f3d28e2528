import type { ChunkResult } from "@docchat/types";
import type { ChunkWindowConfig, IChunker } from "./chunker.interface.js";
import { defaultTokenizer } from "./tokenizer.js";
import type { ITokenizer, TokenSpan } from "./tokenizer.js";
import { buildWindows } from "./windows.js";

export type Boundary = "paragraph" | "line" | "sentence";

const DEFAULT_BOUNDARIES: readonly Boundary[] = ["paragraph", "line", "sentence"];

const SENTENCE_END = /[.!?…]["'”’)\]]*$/;
const PARAGRAPH_BREAK = /\n[^\S\n]*\n/;

/**
 * Token windows whose ends prefer natural breaks. Tries larger boundaries
 * first, falling back to smaller ones, and finally to a hard cut at
 * `maxTokens`. A window is never shortened below half its maximum size.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private readonly boundaries: readonly Boundary[];

  constructor(
    private readonly tokenizer: ITokenizer = defaultTokenizer,
    boundaries?: readonly Boundary[],
  ) {
    this.boundaries = boundaries ?? DEFAULT_BOUNDARIES;
  }

  chunk(content: string, config: ChunkWindowConfig): ChunkResult[] {
    const floor = Math.ceil(config.maxTokens / 2);

    return buildWindows(content, config, this.tokenizer, (tokens, start, minEnd, hardEnd) => {
      const lowest = Math.max(minEnd + 1, start + floor);
      for (const boundary of this.boundaries) {
        for (let end = hardEnd; end >= lowest; end--) {
          const token = tokens[end - 1];
          if (token && endsAt(content, token, boundary)) {
            return end;
          }
        }
      }
      return hardEnd;
    });
  }
}

function endsAt(content: string, token: TokenSpan, boundary: Boundary): boolean {
  const trailing = content.slice(token.wordEnd, token.end);
  switch (boundary) {
    case "paragraph":
      return PARAGRAPH_BREAK.test(trailing);
    case "line":
      return trailing.includes("\n");
    case "sentence":
      return trailing.length > 0 && SENTENCE_END.test(content.slice(token.start, token.wordEnd));
    default:
      throw new Error(`Unknown boundary: ${String(boundary)}`);
  }
}
