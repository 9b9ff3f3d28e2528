import mammoth from "mammoth";
import type { ParseResult } from "@docchat/types";
import { ValidationError } from "@docchat/errors";
import type { IParser } from "./parser.interface.js";

export const DOCX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

/** Raw paragraph text of a Word document; formatting is dropped. */
export class DocxParser implements IParser {
  readonly supportedMimeTypes = [DOCX_MIME_TYPE] as const;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const buffer = typeof input === "string" ? Buffer.from(input, "utf-8") : Buffer.from(input);

    let text: string;
    let warnings: number;
    try {
      const result = await mammoth.extractRawText({ buffer });
      text = result.value;
      warnings = result.messages.length;
    } catch (error) {
      throw new ValidationError("could not extract text: unreadable DOCX", {}, { cause: error });
    }

    return {
      text,
      pageCount: Math.max(1, Math.ceil(text.length / 3000)),
      metadata: { mimeType, warnings },
    };
  }
}
