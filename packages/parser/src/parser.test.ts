import { describe, it, expect } from "vitest";
import { UnsupportedTypeError, ValidationError } from "@docchat/errors";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";
import { DocxParser, DOCX_MIME_TYPE } from "./docx-parser.js";
import { getParser, isSupportedMimeType, normalizeMimeType } from "./factory.js";

describe("TextParser", () => {
  const parser = new TextParser();

  it("supports text MIME types", () => {
    expect(parser.supportedMimeTypes).toEqual(["text/plain", "text/markdown"]);
  });

  it("parses plain text string", async () => {
    const result = await parser.parse("Hello world", "text/plain");

    expect(result.text).toBe("Hello world");
    expect(result.pageCount).toBe(1);
    expect(result.metadata).toEqual({ mimeType: "text/plain", charCount: 11, wordCount: 2 });
  });

  it("parses Uint8Array input", async () => {
    const input = new TextEncoder().encode("Encoded text");
    const result = await parser.parse(input, "text/plain");

    expect(result.text).toBe("Encoded text");
  });

  it("keeps markdown as written", async () => {
    const result = await parser.parse("# Title\n\n- item", "text/markdown");
    expect(result.text).toBe("# Title\n\n- item");
  });

  it("drops a UTF-8 byte order mark", async () => {
    const input = new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x69]);
    const result = await parser.parse(input, "text/plain");
    expect(result.text).toBe("hi");
  });

  it("rejects bytes that are not UTF-8", async () => {
    const input = new Uint8Array([0xff, 0xfe, 0xfd]);
    await expect(parser.parse(input, "text/plain")).rejects.toBeInstanceOf(ValidationError);
  });

  it("estimates page count", async () => {
    const result = await parser.parse("x".repeat(9000), "text/plain");

    expect(result.pageCount).toBe(3); // 9000 / 3000 = 3
  });
});

describe("PdfParser", () => {
  it("supports application/pdf", () => {
    expect(new PdfParser().supportedMimeTypes).toEqual(["application/pdf"]);
  });

  it("rejects bytes that are not a PDF", async () => {
    const input = new TextEncoder().encode("this is not a pdf");

    await expect(new PdfParser().parse(input, "application/pdf")).rejects.toMatchObject({
      kind: "validation",
      message: "could not extract text: unreadable PDF",
    });
  });
});

describe("DocxParser", () => {
  it("rejects bytes that are not a DOCX archive", async () => {
    const input = new TextEncoder().encode("plain bytes");

    await expect(new DocxParser().parse(input, DOCX_MIME_TYPE)).rejects.toMatchObject({
      kind: "validation",
      message: "could not extract text: unreadable DOCX",
    });
  });
});

describe("getParser factory", () => {
  it("returns TextParser for text/plain and text/markdown", () => {
    expect(getParser("text/plain")).toBeInstanceOf(TextParser);
    expect(getParser("text/markdown")).toBeInstanceOf(TextParser);
  });

  it("returns PdfParser and DocxParser for document types", () => {
    expect(getParser("application/pdf")).toBeInstanceOf(PdfParser);
    expect(getParser(DOCX_MIME_TYPE)).toBeInstanceOf(DocxParser);
  });

  it("ignores mime parameters and case", () => {
    expect(getParser("Text/Plain; charset=utf-8")).toBeInstanceOf(TextParser);
  });

  it("rejects unsupported types", () => {
    expect(() => getParser("image/png")).toThrow(UnsupportedTypeError);
    expect(() => getParser("image/png")).toThrow("Unsupported file type: image/png");
  });
});

describe("mime helpers", () => {
  it("normalizes", () => {
    expect(normalizeMimeType(" TEXT/Markdown ; charset=UTF-8")).toBe("text/markdown");
  });

  it("recognizes the supported set", () => {
    expect(isSupportedMimeType("application/pdf")).toBe(true);
    expect(isSupportedMimeType("text/html")).toBe(false);
  });
});
