import { describe, it, expect } from "vitest";
import { classifyProviderError } from "./classify.js";
import { AppError } from "./app-error.js";
import {
  CancelledError,
  NotFoundError,
  PermanentProviderError,
  RateLimitedError,
  ResourceExhaustedError,
  TransientProviderError,
} from "./errors.js";

function httpError(status: number, extra: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(`HTTP ${String(status)}`), { status, ...extra });
}

describe("classifyProviderError", () => {
  it("passes AppErrors through", () => {
    const err = new NotFoundError();
    expect(classifyProviderError(err, "openai")).toBe(err);
  });

  it.each([401, 403])("maps %i to invalid-credential", (status) => {
    const result = classifyProviderError(httpError(status), "openai");
    expect(result).toBeInstanceOf(PermanentProviderError);
    expect(result).toMatchObject({ reason: "invalid-credential", retryable: false });
  });

  it("maps content policy 400s to content-rejected", () => {
    const result = classifyProviderError(
      httpError(400, { code: "content_policy_violation" }),
      "openai",
    );
    expect(result).toMatchObject({ kind: "permanent-provider", reason: "content-rejected" });
  });

  it("maps other 4xx to bad-request", () => {
    expect(classifyProviderError(httpError(422), "cohere")).toMatchObject({
      reason: "bad-request",
    });
    expect(classifyProviderError(httpError(413), "cohere")).toMatchObject({
      reason: "unsupported-input",
    });
  });

  it("reads statusCode as well as status", () => {
    const err = Object.assign(new Error("unauthorized"), { statusCode: 401 });
    expect(classifyProviderError(err, "cohere")).toMatchObject({ reason: "invalid-credential" });
  });

  it("maps quota 429s to resource-exhausted", () => {
    const result = classifyProviderError(httpError(429, { code: "insufficient_quota" }), "openai");
    expect(result).toBeInstanceOf(ResourceExhaustedError);
    expect(result.retryable).toBe(false);
  });

  it("maps other 429s to a retryable rate limit", () => {
    const result = classifyProviderError(
      httpError(429, { headers: { "retry-after": "7" } }),
      "google",
    );
    expect(result).toBeInstanceOf(RateLimitedError);
    expect(result).toMatchObject({ retryable: true, retryAfter: 7 });
  });

  it.each([408, 409, 500, 502, 503])("maps %i to transient", (status) => {
    const result = classifyProviderError(httpError(status), "openai");
    expect(result).toBeInstanceOf(TransientProviderError);
    expect(result.retryable).toBe(true);
  });

  it("maps network failures to transient", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const connection = Object.assign(new Error("Connection error."), {
      name: "APIConnectionError",
    });
    expect(classifyProviderError(reset, "openai").retryable).toBe(true);
    expect(classifyProviderError(connection, "openai").retryable).toBe(true);
  });

  it("maps aborts to cancelled", () => {
    const abort = Object.assign(new Error("aborted"), { name: "AbortError" });
    expect(classifyProviderError(abort, "openai")).toBeInstanceOf(CancelledError);
  });

  it("keeps the original error as cause", () => {
    const original = httpError(503);
    expect(classifyProviderError(original, "openai").cause).toBe(original);
  });

  it("maps unknown errors to a non-retryable internal error", () => {
    const result = classifyProviderError(new Error("weird"), "openai");
    expect(result).toBeInstanceOf(AppError);
    expect(result).toMatchObject({ kind: "internal", retryable: false, message: "weird" });
  });
});
