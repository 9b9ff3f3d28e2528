import type { ChatTurn, Citation, ContextFormat, Message, ScoredChunk } from "@docchat/types";
import type { ITokenizer } from "@docchat/chunker";
import { defaultTokenizer } from "@docchat/chunker";

export interface ContextBudgetInput {
  contextWindow: number;
  systemTokens: number;
  historyTokens: number;
  questionTokens: number;
  /** Space kept free for the answer. */
  answerReserve: number;
}

export interface ContextBlock {
  chunkId: string;
  documentId: string;
  filename: string;
  chunkIndex: number;
  text: string;
  tokenCount: number;
  score: number;
  partial: boolean;
}

export interface AssembledContext {
  blocks: ContextBlock[];
  citations: Citation[];
  tokensUsed: number;
  /** The only block is a truncated top-ranked chunk. */
  partial: boolean;
}

/** Tokens left for retrieved context once everything else has its share. */
export function computeContextBudget(input: ContextBudgetInput): number {
  const remaining =
    input.contextWindow -
    input.systemTokens -
    input.historyTokens -
    input.questionTokens -
    input.answerReserve;
  return Math.max(0, Math.floor(remaining));
}

function byScore(a: ScoredChunk, b: ScoredChunk): number {
  return b.score - a.score || a.chunkIndex - b.chunkIndex || (a.chunkId < b.chunkId ? -1 : 1);
}

/**
 * Greedy packing by descending score. A chunk that does not fit is skipped
 * whole and later, smaller chunks may still go in. Only when the best chunk
 * alone is larger than the budget is it cut down, and then it is flagged
 * partial.
 *
 * With a `format`, the budget covers the formatted context including its
 * headings and separators, and `tokensUsed` is the size of
 * `formatContext(blocks, format)`. Without one only chunk text is counted.
 */
export function assembleContext(
  ranked: ScoredChunk[],
  budget: number,
  tokenizer: ITokenizer = defaultTokenizer,
  format?: ContextFormat,
): AssembledContext {
  const cost = (candidate: ContextBlock[]): number =>
    format
      ? tokenizer.count(formatContext(candidate, format))
      : candidate.reduce((sum, block) => sum + block.tokenCount, 0);

  const blocks: ContextBlock[] = [];
  let tokensUsed = 0;
  let partial = false;

  const ordered = [...ranked].sort(byScore);
  for (const [position, chunk] of ordered.entries()) {
    const block = toBlock(chunk, chunk.content, tokenizer.count(chunk.content), false);
    const total = cost([...blocks, block]);
    if (total <= budget) {
      blocks.push(block);
      tokensUsed = total;
      continue;
    }

    if (position === 0 && budget > 0) {
      const framing = cost([toBlock(chunk, "", 0, true)]);
      const text = tokenizer.truncate(chunk.content, budget - framing);
      const truncated = toBlock(chunk, text, tokenizer.count(text), true);
      const truncatedTotal = cost([truncated]);
      if (truncated.tokenCount > 0 && truncatedTotal <= budget) {
        blocks.push(truncated);
        tokensUsed = truncatedTotal;
        partial = true;
      }
      // The truncated chunk fills the budget.
      break;
    }
  }

  return {
    blocks,
    citations: blocks.map((b) => ({
      chunkId: b.chunkId,
      documentId: b.documentId,
      filename: b.filename,
      chunkIndex: b.chunkIndex,
      score: b.score,
      partial: b.partial,
    })),
    tokensUsed,
    partial,
  };
}

function toBlock(chunk: ScoredChunk, text: string, tokenCount: number, partial: boolean): ContextBlock {
  return {
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    filename: chunk.filename,
    chunkIndex: chunk.chunkIndex,
    text,
    tokenCount,
    score: chunk.score,
    partial,
  };
}

/**
 * Model-agnostic context formatting.
 *
 * - XML: tagged documents
 * - Markdown: headed sections separated by rules
 * - Plain: numbered sections
 */
export function formatContext(blocks: ContextBlock[], format: ContextFormat): string {
  if (blocks.length === 0) return "";

  switch (format) {
    case "xml":
      return formatXml(blocks);
    case "markdown":
      return formatMarkdown(blocks);
    case "plain":
    default:
      return formatPlain(blocks);
  }
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}

function formatXml(blocks: ContextBlock[]): string {
  const parts = blocks.map(
    (block, i) =>
      `<document index="${String(i + 1)}" source="${escapeAttribute(block.filename)}" chunk="${String(block.chunkIndex)}">\n${block.text}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function formatMarkdown(blocks: ContextBlock[]): string {
  const parts = blocks.map(
    (block, i) =>
      `### Source ${String(i + 1)} (${block.filename}, chunk ${String(block.chunkIndex)})\n\n${block.text}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function formatPlain(blocks: ContextBlock[]): string {
  const parts = blocks.map((block, i) => `[${String(i + 1)}] (Source: ${block.filename})\n${block.text}`);

  return parts.join("\n\n");
}

/**
 * Conversation history for the model, newest exchanges first until
 * `maxTokens` is reached. Error replies and the questions they answered are
 * left out, so the history is a run of complete user/assistant pairs.
 */
export function fitHistory(
  messages: Message[],
  maxTokens: number,
  tokenizer: ITokenizer = defaultTokenizer,
): ChatTurn[] {
  const pairs: Array<[ChatTurn, ChatTurn]> = [];
  for (let i = 0; i + 1 < messages.length; i++) {
    const question = messages[i];
    const answer = messages[i + 1];
    if (
      question?.role === "user" &&
      answer?.role === "assistant" &&
      answer.status !== "error" &&
      answer.text.trim().length > 0
    ) {
      pairs.push([
        { role: "user", content: question.text },
        { role: "assistant", content: answer.text },
      ]);
      i++;
    }
  }

  const kept: Array<[ChatTurn, ChatTurn]> = [];
  let used = 0;
  for (let i = pairs.length - 1; i >= 0; i--) {
    const pair = pairs[i];
    if (!pair) continue;
    const tokens = tokenizer.count(pair[0].content) + tokenizer.count(pair[1].content);
    if (used + tokens > maxTokens) break;
    used += tokens;
    kept.unshift(pair);
  }
  return kept.flat();
}

export function countTurns(turns: ChatTurn[], tokenizer: ITokenizer = defaultTokenizer): number {
  return turns.reduce((sum, turn) => sum + tokenizer.count(turn.content), 0);
}
