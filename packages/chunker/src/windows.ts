import type { ChunkResult } from "@docchat/types";
import { ValidationError } from "@docchat/errors";
import type { ChunkWindowConfig } from "./chunker.interface.js";
import type { ITokenizer, TokenSpan } from "./tokenizer.js";

/**
 * Chooses where a window that starts at token `start` ends, given that it may
 * not extend past `hardEnd` (exclusive) nor end at or before `minEnd`.
 */
export type EndSelector = (tokens: TokenSpan[], start: number, minEnd: number, hardEnd: number) => number;

export function validateWindowConfig({ maxTokens, overlap }: ChunkWindowConfig): void {
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ValidationError("maxTokens must be a positive integer", { maxTokens: "invalid" });
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError("overlap must be a non-negative integer", { overlap: "invalid" });
  }
  if (overlap >= maxTokens) {
    throw new ValidationError("overlap must be smaller than maxTokens", { overlap: "too large" });
  }
}

/**
 * Slide a window of at most `maxTokens` tokens over the text. Each window
 * after the first starts `overlap` tokens before the previous one ended, so
 * the next start always advances.
 */
export function buildWindows(
  content: string,
  config: ChunkWindowConfig,
  tokenizer: ITokenizer,
  selectEnd: EndSelector,
): ChunkResult[] {
  validateWindowConfig(config);
  const { maxTokens, overlap } = config;
  const tokens = tokenizer.tokenize(content);
  const results: ChunkResult[] = [];

  let start = 0;
  let previousEnd = 0;
  while (start < tokens.length) {
    const hardEnd = Math.min(start + maxTokens, tokens.length);
    const end =
      hardEnd === tokens.length ? hardEnd : selectEnd(tokens, start, start + overlap, hardEnd);

    const first = tokens[start];
    const last = tokens[end - 1];
    if (!first || !last) break;

    results.push({
      content: content.slice(first.start, last.end),
      index: results.length,
      tokenCount: end - start,
      metadata: {
        startChar: first.start,
        endChar: last.end,
        startToken: start,
        endToken: end,
        overlapTokens: results.length === 0 ? 0 : previousEnd - start,
      },
    });

    if (end >= tokens.length) break;
    previousEnd = end;
    start = end - overlap;
  }

  return results;
}

/**
 * Rebuild the chunked text by dropping from each chunk the characters it
 * shares with the previous one.
 */
export function reconstructText(chunks: readonly ChunkResult[]): string {
  let text = "";
  let coveredTo = 0;
  for (const chunk of chunks) {
    const { startChar, endChar } = chunk.metadata;
    const skip = Math.max(0, coveredTo - startChar);
    text += chunk.content.slice(skip);
    coveredTo = Math.max(coveredTo, endChar);
  }
  return text;
}
