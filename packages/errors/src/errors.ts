import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      kind: "not-found",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorExtras) {
    super({
      message,
      statusCode: 409,
      code: "CONFLICT",
      kind: "conflict",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class InvalidTransitionError extends ConflictError {
  public readonly from: string;
  public readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid processing transition: ${from} -> ${to}`, { details: { from, to } });
    this.from = from;
    this.to = to;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      kind: "validation",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class UnsupportedTypeError extends AppError {
  public readonly mimeType: string;

  constructor(mimeType: string, supported: readonly string[]) {
    super({
      message: `Unsupported file type: ${mimeType}`,
      statusCode: 415,
      code: "UNSUPPORTED_TYPE",
      kind: "unsupported-type",
      details: { supported: [...supported] },
    });
    this.mimeType = mimeType;
  }
}

export class EmptyDocumentError extends AppError {
  constructor(message = "empty document") {
    super({ message, statusCode: 422, code: "EMPTY_DOCUMENT", kind: "empty-document" });
  }
}

export class TransientProviderError extends AppError {
  public readonly service: string;

  constructor(message = "Provider temporarily unavailable", service: string, options?: ErrorExtras & { code?: string }) {
    super({
      message,
      statusCode: 503,
      code: options?.code ?? "PROVIDER_UNAVAILABLE",
      kind: "transient-provider",
      retryable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class RateLimitedError extends TransientProviderError {
  /** Seconds the provider asked to wait, from its `retry-after` header. */
  public readonly retryAfter: number | null;

  constructor(message = "Rate limited", service: string, retryAfter: number | null = null, options?: ErrorExtras) {
    super(message, service, { ...options, code: "RATE_LIMITED" });
    this.retryAfter = retryAfter;
  }
}

export class ProviderTimeoutError extends TransientProviderError {
  public readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number) {
    super(`${service} did not respond within ${String(timeoutMs)}ms`, service, { code: "TIMEOUT" });
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderRetriesExhaustedError extends AppError {
  public readonly service: string;
  public readonly attempts: number;

  constructor(service: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super({
      message: `${service} failed after ${String(attempts)} attempts${reason}`,
      statusCode: 503,
      code: "PROVIDER_RETRIES_EXHAUSTED",
      kind: "transient-provider-exhausted",
      details: { attempts },
      cause,
    });
    this.service = service;
    this.attempts = attempts;
  }
}

export type PermanentProviderReason =
  | "invalid-credential"
  | "content-rejected"
  | "unsupported-input"
  | "bad-request";

export class PermanentProviderError extends AppError {
  public readonly service: string;
  public readonly reason: PermanentProviderReason;

  constructor(message: string, service: string, reason: PermanentProviderReason, options?: ErrorExtras) {
    super({
      message,
      statusCode: reason === "invalid-credential" ? 401 : 422,
      code: reason.toUpperCase().replace(/-/g, "_"),
      kind: "permanent-provider",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
    this.reason = reason;
  }
}

export class ResourceExhaustedError extends AppError {
  public readonly resource: string;

  constructor(message: string, resource: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 507,
      code: "RESOURCE_EXHAUSTED",
      kind: "resource-exhausted",
      details: options?.details,
      cause: options?.cause,
    });
    this.resource = resource;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context = "vector") {
    super({
      message: `Dimension mismatch for ${context}: expected ${String(expected)}, got ${String(actual)}`,
      statusCode: 422,
      code: "DIMENSION_MISMATCH",
      kind: "dimension-mismatch",
      details: { expected, actual },
    });
    this.expected = expected;
    this.actual = actual;
  }
}

/** The current embedding model differs from the one the documents were indexed with. */
export class EmbeddingModelMismatchError extends AppError {
  public readonly current: string;
  public readonly indexedWith: string[];

  constructor(current: string, indexedWith: string[]) {
    super({
      message: `Documents were indexed with ${indexedWith.join(", ")}, current embedding model is ${current}`,
      statusCode: 409,
      code: "EMBEDDING_MODEL_MISMATCH",
      kind: "dimension-mismatch",
      details: { current, indexedWith },
    });
    this.current = current;
    this.indexedWith = indexedWith;
  }
}

export class CancelledError extends AppError {
  constructor(message = "Operation cancelled", options?: ErrorExtras) {
    super({
      message,
      statusCode: 499,
      code: "CANCELLED",
      kind: "cancelled",
      details: options?.details,
      cause: options?.cause,
    });
  }
}
