import { describe, it, expect } from "vitest";
import { AppError, describeError } from "./app-error.js";
import {
  NotFoundError,
  ConflictError,
  InvalidTransitionError,
  RateLimitedError,
  ValidationError,
  UnsupportedTypeError,
  EmptyDocumentError,
  TransientProviderError,
  ProviderTimeoutError,
  PermanentProviderError,
  ResourceExhaustedError,
  DimensionMismatchError,
  EmbeddingModelMismatchError,
  CancelledError,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      kind: "internal",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true, kind to internal and retryable to false", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.kind).toBe("internal");
    expect(err.retryable).toBe(false);
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });
    const plainErr = new Error("plain");

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(plainErr)).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("Error Subclasses", () => {
  describe("NotFoundError", () => {
    it("has status 404, NOT_FOUND code and not-found kind", () => {
      const err = new NotFoundError();
      expect(err.statusCode).toBe(404);
      expect(err.code).toBe("NOT_FOUND");
      expect(err.kind).toBe("not-found");
      expect(err.message).toBe("Resource not found");
      expect(err.name).toBe("NotFoundError");
      expect(err).toBeInstanceOf(AppError);
    });

    it("accepts custom message and details", () => {
      const err = new NotFoundError("Document not found", { details: { id: "doc-1" } });
      expect(err.message).toBe("Document not found");
      expect(err.details).toEqual({ id: "doc-1" });
    });
  });

  describe("ConflictError", () => {
    it("has status 409 and CONFLICT code", () => {
      const err = new ConflictError();
      expect(err.statusCode).toBe(409);
      expect(err.code).toBe("CONFLICT");
      expect(err.kind).toBe("conflict");
    });

    it("InvalidTransitionError names both states", () => {
      const err = new InvalidTransitionError("indexed", "embedding");
      expect(err).toBeInstanceOf(ConflictError);
      expect(err.message).toBe("Invalid processing transition: indexed -> embedding");
      expect(err.from).toBe("indexed");
      expect(err.to).toBe("embedding");
    });
  });

  describe("ValidationError", () => {
    it("has status 400, VALIDATION_ERROR code, and fields", () => {
      const fields = { text: "Required" };
      const err = new ValidationError("Validation failed", fields);
      expect(err.statusCode).toBe(400);
      expect(err.code).toBe("VALIDATION_ERROR");
      expect(err.kind).toBe("validation");
      expect(err.fields).toEqual(fields);
      expect(err.name).toBe("ValidationError");
    });
  });

  describe("document errors", () => {
    it("UnsupportedTypeError carries the mime type", () => {
      const err = new UnsupportedTypeError("image/png", ["text/plain"]);
      expect(err.kind).toBe("unsupported-type");
      expect(err.mimeType).toBe("image/png");
      expect(err.message).toBe("Unsupported file type: image/png");
      expect(err.details).toEqual({ supported: ["text/plain"] });
    });

    it("EmptyDocumentError defaults its message", () => {
      const err = new EmptyDocumentError();
      expect(err.kind).toBe("empty-document");
      expect(err.message).toBe("empty document");
    });
  });

  describe("provider errors", () => {
    it("TransientProviderError is retryable", () => {
      const err = new TransientProviderError("Upstream 503", "openai");
      expect(err.retryable).toBe(true);
      expect(err.kind).toBe("transient-provider");
      expect(err.service).toBe("openai");
    });

    it("RateLimitedError is transient with retryAfter", () => {
      const err = new RateLimitedError("Too many requests", "google", 60);
      expect(err).toBeInstanceOf(TransientProviderError);
      expect(err.code).toBe("RATE_LIMITED");
      expect(err.retryAfter).toBe(60);
      expect(err.retryable).toBe(true);
      expect(err.name).toBe("RateLimitedError");
    });

    it("ProviderTimeoutError reports the timeout", () => {
      const err = new ProviderTimeoutError("cohere", 250);
      expect(err.retryable).toBe(true);
      expect(err.code).toBe("TIMEOUT");
      expect(err.message).toBe("cohere did not respond within 250ms");
    });

    it("PermanentProviderError is not retryable and derives its code from the reason", () => {
      const err = new PermanentProviderError("Invalid API key", "openai", "invalid-credential");
      expect(err.retryable).toBe(false);
      expect(err.kind).toBe("permanent-provider");
      expect(err.code).toBe("INVALID_CREDENTIAL");
      expect(err.statusCode).toBe(401);
      expect(err.reason).toBe("invalid-credential");
    });
  });

  it("ResourceExhaustedError names the resource", () => {
    const err = new ResourceExhaustedError("index full", "vector-index");
    expect(err.kind).toBe("resource-exhausted");
    expect(err.resource).toBe("vector-index");
  });

  it("DimensionMismatchError reports both sizes", () => {
    const err = new DimensionMismatchError(3, 2, "query vector");
    expect(err.kind).toBe("dimension-mismatch");
    expect(err.message).toBe("Dimension mismatch for query vector: expected 3, got 2");
  });

  it("EmbeddingModelMismatchError names both models", () => {
    const err = new EmbeddingModelMismatchError("openai:large", ["openai:small"]);
    expect(err.kind).toBe("dimension-mismatch");
    expect(err.statusCode).toBe(409);
    expect(err.message).toBe(
      "Documents were indexed with openai:small, current embedding model is openai:large",
    );
  });

  it("CancelledError has kind cancelled", () => {
    expect(new CancelledError().kind).toBe("cancelled");
  });
});

describe("describeError", () => {
  it("uses kind and message of AppErrors", () => {
    expect(describeError(new EmptyDocumentError())).toEqual({
      kind: "empty-document",
      message: "empty document",
    });
  });

  it("maps plain errors to internal", () => {
    expect(describeError(new Error("disk full"))).toEqual({
      kind: "internal",
      message: "disk full",
    });
  });

  it("never returns an empty message", () => {
    expect(describeError("weird")).toEqual({ kind: "internal", message: "Unexpected error" });
    expect(describeError(new Error(""))).toEqual({ kind: "internal", message: "Unexpected error" });
  });
});
