import { SUPPORTED_MIME_TYPES } from "@docchat/types";
import type { SupportedMimeType } from "@docchat/types";
import { UnsupportedTypeError } from "@docchat/errors";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { DocxParser } from "./docx-parser.js";

const allParsers: IParser[] = [new TextParser(), new PdfParser(), new DocxParser()];

/** Strips parameters such as `; charset=utf-8` and lower-cases. */
export function normalizeMimeType(mimeType: string): string {
  return (mimeType.split(";")[0] ?? "").trim().toLowerCase();
}

export function isSupportedMimeType(mimeType: string): mimeType is SupportedMimeType {
  return SUPPORTED_MIME_TYPES.some((supported) => supported === mimeType);
}

/**
 * Select the parser for a mime type. Unknown types are rejected rather than
 * read as text.
 */
export function getParser(mimeType: string): IParser {
  const normalized = normalizeMimeType(mimeType);
  const parser = allParsers.find((p) => p.supportedMimeTypes.includes(normalized));

  if (!parser) {
    throw new UnsupportedTypeError(mimeType, SUPPORTED_MIME_TYPES);
  }

  return parser;
}
