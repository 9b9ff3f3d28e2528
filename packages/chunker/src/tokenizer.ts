export interface TokenSpan {
  /** Offset of the token's first character. */
  start: number;
  /** Offset just past the token's trailing whitespace. */
  end: number;
  /** Offset just past the token's last non-whitespace character. */
  wordEnd: number;
}

export interface ITokenizer {
  tokenize(text: string): TokenSpan[];
  count(text: string): number;
  /** The longest prefix of `text` holding at most `maxTokens` tokens. */
  truncate(text: string, maxTokens: number): string;
}

const WORD = /\S+/g;

/**
 * Whitespace tokenizer. A token is a run of non-whitespace plus the
 * whitespace after it; whitespace before the first word belongs to the first
 * token. Spans therefore tile the text exactly and concatenating any run of
 * consecutive tokens gives back the original characters.
 */
export class WordTokenizer implements ITokenizer {
  tokenize(text: string): TokenSpan[] {
    const spans: TokenSpan[] = [];
    for (const match of text.matchAll(WORD)) {
      const start = match.index ?? 0;
      const wordEnd = start + match[0].length;
      const previous = spans.at(-1);
      if (previous) {
        previous.end = start;
      }
      spans.push({ start: previous ? start : 0, end: text.length, wordEnd });
    }
    return spans;
  }

  count(text: string): number {
    return text.match(WORD)?.length ?? 0;
  }

  truncate(text: string, maxTokens: number): string {
    if (maxTokens <= 0) return "";
    const spans = this.tokenize(text);
    const last = spans[Math.min(maxTokens, spans.length) - 1];
    return last ? text.slice(0, last.end) : "";
  }
}

export const defaultTokenizer: ITokenizer = new WordTokenizer();
