import * as pdfjsLib from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ParseResult } from "@docchat/types";
import { ValidationError } from "@docchat/errors";
import type { IParser } from "./parser.interface.js";

/**
 * Text layer of a PDF via pdf.js. Pages are separated by a blank line; items
 * flagged end-of-line keep their line break. Layout is not preserved.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = ["application/pdf"] as const;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const data = typeof input === "string" ? new TextEncoder().encode(input) : new Uint8Array(input);

    let pdf: Awaited<ReturnType<typeof pdfjsLib.getDocument>["promise"]>;
    try {
      pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false, useSystemFonts: false })
        .promise;
    } catch (error) {
      throw new ValidationError("could not extract text: unreadable PDF", {}, { cause: error });
    }

    try {
      const pages: string[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        let pageText = "";
        for (const item of content.items) {
          if ("str" in item) {
            pageText += item.str + (item.hasEOL ? "\n" : " ");
          }
        }
        pages.push(pageText.trimEnd());
        page.cleanup();
      }

      return {
        text: pages.join("\n\n"),
        pageCount: pdf.numPages,
        metadata: { mimeType },
      };
    } finally {
      await pdf.destroy();
    }
  }
}
