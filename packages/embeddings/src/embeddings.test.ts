import { describe, it, expect, vi, beforeEach } from "vitest";

const { openaiCreate, googleEmbed, cohereEmbed } = vi.hoisted(() => ({
  openaiCreate: vi.fn(),
  googleEmbed: vi.fn(),
  cohereEmbed: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    embeddings = { create: openaiCreate };
  },
}));
vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { embedContent: googleEmbed };
  },
}));
vi.mock("cohere-ai", () => ({
  CohereClient: class {
    v2 = { embed: cohereEmbed };
  },
}));

import { createEmbeddingProvider } from "./factory.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import { GoogleEmbeddingProvider, withModelsPrefix } from "./google-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { embeddingModelKey } from "./embedding-provider.interface.js";

describe("Embeddings", () => {
  beforeEach(() => {
    openaiCreate.mockReset();
    googleEmbed.mockReset();
    cohereEmbed.mockReset();
  });

  describe("createEmbeddingProvider factory", () => {
    it("creates OpenAIEmbeddingProvider for 'openai'", () => {
      const provider = createEmbeddingProvider({ provider: "openai", apiKey: "test-key" });
      expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
      expect(provider.model).toBe("text-embedding-3-small");
      expect(provider.dimensions).toBe(1536);
      expect(provider.maxBatchSize).toBe(2048);
    });

    it("creates GoogleEmbeddingProvider for 'google'", () => {
      const provider = createEmbeddingProvider({ provider: "google", apiKey: "test-key" });
      expect(provider).toBeInstanceOf(GoogleEmbeddingProvider);
      expect(provider.dimensions).toBe(768);
      expect(provider.maxBatchSize).toBe(100);
    });

    it("creates CohereEmbeddingProvider for 'cohere'", () => {
      const provider = createEmbeddingProvider({ provider: "cohere", apiKey: "test-key" });
      expect(provider).toBeInstanceOf(CohereEmbeddingProvider);
      expect(provider.name).toBe("cohere");
      expect(provider.maxBatchSize).toBe(96);
    });

    it("leaves dimensions unknown for unlisted models", () => {
      const provider = createEmbeddingProvider({
        provider: "openai",
        apiKey: "test-key",
        model: "custom-embedder",
      });
      expect(provider.dimensions).toBeNull();
    });

    it("respects custom dimensions", () => {
      const provider = createEmbeddingProvider({
        provider: "cohere",
        apiKey: "test-key",
        dimensions: 256,
      });
      expect(provider.dimensions).toBe(256);
    });
  });

  describe("embeddingModelKey", () => {
    it("joins provider and model", () => {
      expect(embeddingModelKey({ name: "google", model: "text-embedding-004" })).toBe(
        "google:text-embedding-004",
      );
    });
  });

  describe("OpenAIEmbeddingProvider", () => {
    it("returns vectors in input order and forwards the signal", async () => {
      openaiCreate.mockResolvedValue({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      });
      const controller = new AbortController();
      const provider = new OpenAIEmbeddingProvider({ apiKey: "test-key" });

      const vectors = await provider.embed(["a", "b"], { signal: controller.signal });

      expect(vectors).toEqual([
        [1, 0],
        [0, 1],
      ]);
      expect(openaiCreate).toHaveBeenCalledWith(
        { model: "text-embedding-3-small", input: ["a", "b"], encoding_format: "float" },
        { signal: controller.signal },
      );
    });

    it("skips the request for no input", async () => {
      const provider = new OpenAIEmbeddingProvider({ apiKey: "test-key" });
      await expect(provider.embed([])).resolves.toEqual([]);
      expect(openaiCreate).not.toHaveBeenCalled();
    });
  });

  describe("GoogleEmbeddingProvider", () => {
    it("uses the query task type for queries and the models/ prefix", async () => {
      googleEmbed.mockResolvedValue({ embeddings: [{ values: [0.5, 0.5] }] });
      const provider = new GoogleEmbeddingProvider({ apiKey: "test-key", model: "models/text-embedding-004" });

      const vectors = await provider.embed(["q"], { inputType: "query" });

      expect(vectors).toEqual([[0.5, 0.5]]);
      expect(provider.model).toBe("text-embedding-004");
      expect(googleEmbed).toHaveBeenCalledWith({
        model: "models/text-embedding-004",
        contents: ["q"],
        config: { taskType: "RETRIEVAL_QUERY", outputDimensionality: undefined, abortSignal: undefined },
      });
    });

    it("adds the models/ prefix only when missing", () => {
      expect(withModelsPrefix("gemini-embedding-001")).toBe("models/gemini-embedding-001");
      expect(withModelsPrefix("models/gemini-embedding-001")).toBe("models/gemini-embedding-001");
    });
  });

  describe("CohereEmbeddingProvider", () => {
    it("embeds documents as search_document", async () => {
      cohereEmbed.mockResolvedValue({ embeddings: { float: [[1, 2, 3]] } });
      const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

      await expect(provider.embed(["doc"])).resolves.toEqual([[1, 2, 3]]);
      expect(cohereEmbed).toHaveBeenCalledWith(
        {
          texts: ["doc"],
          model: "embed-v4.0",
          inputType: "search_document",
          embeddingTypes: ["float"],
        },
        { abortSignal: undefined, maxRetries: 0 },
      );
    });

    it("embeds queries as search_query", async () => {
      cohereEmbed.mockResolvedValue({ embeddings: { float: [[1]] } });
      const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

      await provider.embed(["question"], { inputType: "query" });

      expect(cohereEmbed.mock.calls[0]?.[0]).toMatchObject({ inputType: "search_query" });
    });
  });
});
