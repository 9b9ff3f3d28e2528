import { describe, it, expect, vi } from "vitest";
import { withTimeout } from "./timeout.js";
import { CancelledError, ProviderTimeoutError } from "./errors.js";

function hang(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted by signal")));
  });
}

describe("withTimeout", () => {
  it("resolves with the value when fn finishes in time", async () => {
    await expect(withTimeout(() => Promise.resolve(42), 1_000)).resolves.toBe(42);
  });

  it("passes fn errors through", async () => {
    await expect(withTimeout(() => Promise.reject(new Error("nope")), 1_000)).rejects.toThrow(
      "nope",
    );
  });

  it("rejects with ProviderTimeoutError and aborts the call after the deadline", async () => {
    const seen: AbortSignal[] = [];
    const promise = withTimeout(
      (signal) => {
        seen.push(signal);
        return hang(signal);
      },
      10,
      { service: "openai" },
    );

    await expect(promise).rejects.toBeInstanceOf(ProviderTimeoutError);
    await expect(promise).rejects.toThrow("openai did not respond within 10ms");
    expect(seen[0]?.aborted).toBe(true);
  });

  it("rejects with CancelledError when the caller aborts", async () => {
    const controller = new AbortController();
    const promise = withTimeout(hang, 1_000, { signal: controller.signal });
    controller.abort();

    await expect(promise).rejects.toBeInstanceOf(CancelledError);
  });

  it("does not call fn when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue("late");

    await expect(withTimeout(fn, 1_000, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(fn).not.toHaveBeenCalled();
  });
});
