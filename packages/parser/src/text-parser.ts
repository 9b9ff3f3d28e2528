import type { ParseResult } from "@docchat/types";
import { ValidationError } from "@docchat/errors";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = ["text/plain", "text/markdown"] as const;

// Roughly 3000 characters per printed page.
const CHARS_PER_PAGE = 3000;

/**
 * Plain text and markdown parser. Input must be valid UTF-8; a leading BOM is
 * dropped.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  private readonly decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const text = typeof input === "string" ? input : this.decode(input);

    return {
      text,
      pageCount: Math.max(1, Math.ceil(text.length / CHARS_PER_PAGE)),
      metadata: {
        mimeType,
        charCount: text.length,
        wordCount: text.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private decode(input: Uint8Array): string {
    try {
      return this.decoder.decode(input);
    } catch (error) {
      throw new ValidationError("could not extract text: file is not valid UTF-8", {}, { cause: error });
    }
  }
}
