import { describe, it, expect, vi } from "vitest";
import {
  CancelledError,
  DimensionMismatchError,
  PermanentProviderError,
  ProviderRetriesExhaustedError,
  ProviderTimeoutError,
} from "@docchat/errors";
import type { EmbedOptions } from "@docchat/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { ResilientEmbeddingProvider } from "./resilient-provider.js";

const FAST = { timeoutMs: 1_000, maxRetries: 2, retryBaseDelayMs: 1, retryMaxDelayMs: 1 };

function fakeProvider(
  embed: (texts: string[], options?: EmbedOptions) => Promise<number[][]>,
  overrides: Partial<Pick<IEmbeddingProvider, "dimensions" | "maxBatchSize">> = {},
): IEmbeddingProvider {
  return {
    name: "openai",
    model: "test-model",
    dimensions: 2,
    maxBatchSize: 3,
    embed: vi.fn(embed),
    ...overrides,
  };
}

const unitVectors = (texts: string[]): Promise<number[][]> =>
  Promise.resolve(texts.map((t) => [t.length, 1]));

describe("ResilientEmbeddingProvider", () => {
  it("splits input into batches of min(batchSize, maxBatchSize) and keeps order", async () => {
    const inner = fakeProvider(unitVectors);
    const provider = new ResilientEmbeddingProvider(inner, { ...FAST, batchSize: 10 });

    const vectors = await provider.embed(["a", "bb", "ccc", "dddd", "eeeee"]);

    expect(vectors).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 1],
      [5, 1],
    ]);
    expect(vi.mocked(inner.embed).mock.calls.map(([texts]) => texts)).toEqual([
      ["a", "bb", "ccc"],
      ["dddd", "eeeee"],
    ]);
  });

  it("passes the input type through", async () => {
    const inner = fakeProvider(unitVectors);
    const provider = new ResilientEmbeddingProvider(inner, { ...FAST, batchSize: 10 });

    await provider.embed(["q"], { inputType: "query" });

    expect(vi.mocked(inner.embed).mock.calls[0]?.[1]).toMatchObject({ inputType: "query" });
  });

  it("retries transient SDK failures", async () => {
    const outage = Object.assign(new Error("upstream unavailable"), { status: 503 });
    const embed = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockRejectedValueOnce(outage)
      .mockImplementation(unitVectors);
    const provider = new ResilientEmbeddingProvider(fakeProvider(embed), { ...FAST, batchSize: 3 });

    await expect(provider.embed(["a"])).resolves.toEqual([[1, 1]]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it("gives up with ProviderRetriesExhaustedError", async () => {
    const outage = Object.assign(new Error("upstream unavailable"), { status: 503 });
    const embed = vi.fn<(texts: string[]) => Promise<number[][]>>().mockRejectedValue(outage);
    const provider = new ResilientEmbeddingProvider(fakeProvider(embed), { ...FAST, batchSize: 3 });

    await expect(provider.embed(["a"])).rejects.toBeInstanceOf(ProviderRetriesExhaustedError);
    expect(embed).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent failures", async () => {
    const denied = Object.assign(new Error("Incorrect API key"), { status: 401 });
    const embed = vi.fn<(texts: string[]) => Promise<number[][]>>().mockRejectedValue(denied);
    const provider = new ResilientEmbeddingProvider(fakeProvider(embed), { ...FAST, batchSize: 3 });

    await expect(provider.embed(["a"])).rejects.toMatchObject({
      kind: "permanent-provider",
      reason: "invalid-credential",
    });
    expect(embed).toHaveBeenCalledOnce();
  });

  it("times out slow calls and retries them", async () => {
    const embed = vi
      .fn<(texts: string[], options?: EmbedOptions) => Promise<number[][]>>()
      .mockImplementationOnce(() => new Promise(() => undefined))
      .mockImplementation(unitVectors);
    const provider = new ResilientEmbeddingProvider(fakeProvider(embed), {
      ...FAST,
      timeoutMs: 10,
      batchSize: 3,
    });

    await expect(provider.embed(["a"])).resolves.toEqual([[1, 1]]);
    expect(embed).toHaveBeenCalledTimes(2);
    expect(embed.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
  });

  it("reports a timeout once retries are used up", async () => {
    const embed = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockImplementation(() => new Promise(() => undefined));
    const provider = new ResilientEmbeddingProvider(fakeProvider(embed), {
      ...FAST,
      timeoutMs: 5,
      maxRetries: 0,
      batchSize: 3,
    });

    const error: unknown = await provider.embed(["a"]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderRetriesExhaustedError);
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(ProviderTimeoutError);
  });

  it("rejects a wrong vector count", async () => {
    const provider = new ResilientEmbeddingProvider(
      fakeProvider(() => Promise.resolve([[1, 1]])),
      { ...FAST, batchSize: 3 },
    );

    await expect(provider.embed(["a", "b"])).rejects.toBeInstanceOf(PermanentProviderError);
  });

  it("rejects vectors of the wrong dimensionality", async () => {
    const provider = new ResilientEmbeddingProvider(
      fakeProvider(() => Promise.resolve([[1, 2, 3]])),
      { ...FAST, batchSize: 3 },
    );

    await expect(provider.embed(["a"])).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("learns the dimensionality from the first response when unknown", async () => {
    const provider = new ResilientEmbeddingProvider(
      fakeProvider(unitVectors, { dimensions: null }),
      { ...FAST, batchSize: 3 },
    );

    expect(provider.dimensions).toBeNull();
    await provider.embed(["a"]);
    expect(provider.dimensions).toBe(2);
  });

  it("stops when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const inner = fakeProvider(unitVectors);
    const provider = new ResilientEmbeddingProvider(inner, { ...FAST, batchSize: 3 });

    await expect(provider.embed(["a"], { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(inner.embed).not.toHaveBeenCalled();
  });

  it("returns nothing for no input", async () => {
    const inner = fakeProvider(unitVectors);
    const provider = new ResilientEmbeddingProvider(inner, { ...FAST, batchSize: 3 });
    await expect(provider.embed([])).resolves.toEqual([]);
    expect(inner.embed).not.toHaveBeenCalled();
  });
});
