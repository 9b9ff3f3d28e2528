import { describe, it, expect } from "vitest";
import { toChunkRecord, toChunkRow, toDocumentRecord, toMessage } from "./mappers.js";

const created = new Date("2024-03-01T10:00:00Z");

describe("row mappers", () => {
  it("maps a document row to a record", () => {
    const record = toDocumentRecord({
      id: "d1",
      ownerId: "o1",
      filename: "notes.md",
      mimeType: "text/markdown",
      sizeBytes: 120,
      state: "failed",
      error: { kind: "empty-document", message: "empty document" },
      chunkCount: 0,
      embeddingModel: null,
      createdAt: created,
      updatedAt: created,
    });

    expect(record).toEqual({
      id: "d1",
      ownerId: "o1",
      filename: "notes.md",
      mimeType: "text/markdown",
      sizeBytes: 120,
      state: "failed",
      error: { kind: "empty-document", message: "empty document" },
      chunkCount: 0,
      embeddingModel: null,
      createdAt: created,
      updatedAt: created,
    });
  });

  it("round-trips chunk records through insert rows", () => {
    const chunk = {
      id: "c1",
      documentId: "d1",
      ownerId: "o1",
      index: 3,
      text: "body",
      tokenCount: 1,
      startChar: 40,
      endChar: 44,
      startToken: 9,
      endToken: 10,
      overlapTokens: 0,
    };

    expect(toChunkRecord({ ...chunk, createdAt: created })).toEqual(chunk);
    expect(toChunkRow(chunk)).toEqual(chunk);
  });

  it("maps message rows including citations", () => {
    const citation = {
      chunkId: "c1",
      documentId: "d1",
      filename: "notes.md",
      chunkIndex: 0,
      score: 0.8,
      partial: false,
    };

    expect(
      toMessage({
        id: "m1",
        sessionId: "s1",
        role: "assistant",
        text: "answer",
        ordinal: 1,
        status: "complete",
        errorKind: null,
        citations: [citation],
        createdAt: created,
      }),
    ).toMatchObject({ ordinal: 1, citations: [citation], errorKind: null });
  });
});
