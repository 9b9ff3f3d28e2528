import { AppError } from "./app-error.js";
import {
  CancelledError,
  PermanentProviderError,
  RateLimitedError,
  ResourceExhaustedError,
  TransientProviderError,
} from "./errors.js";

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const NETWORK_ERROR_NAMES = new Set([
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "FetchError",
  "TimeoutError",
]);

const QUOTA_CODES = new Set(["insufficient_quota", "quota_exceeded", "billing_hard_limit_reached"]);

const CONTENT_POLICY_CODES = new Set([
  "content_policy_violation",
  "content_filter",
  "safety",
  "blocked",
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === "object" && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function readStatus(err: unknown): number | undefined {
  for (const key of ["status", "statusCode", "code"]) {
    const value = readProperty(err, key);
    if (typeof value === "number" && value >= 100 && value < 600) {
      return value;
    }
  }
  const response = readProperty(err, "response");
  const nested = readProperty(response, "status");
  return typeof nested === "number" ? nested : undefined;
}

/** Lower-cased string codes carried by the error, its `error` body or its cause. */
function readCodes(err: unknown): string[] {
  const codes: string[] = [];
  const sources = [err, readProperty(err, "error"), readProperty(err, "cause")];
  for (const source of sources) {
    for (const key of ["code", "type", "status"]) {
      const value = readProperty(source, key);
      if (typeof value === "string" && value.length > 0) {
        codes.push(value.toLowerCase());
      }
    }
  }
  return codes;
}

function readName(err: unknown): string {
  const name = readProperty(err, "name");
  return typeof name === "string" ? name : "";
}

function readMessage(err: unknown): string {
  if (err instanceof Error && err.message.length > 0) return err.message;
  const message = readProperty(err, "message");
  return typeof message === "string" && message.length > 0 ? message : "Unknown provider error";
}

function readRetryAfter(err: unknown): number | null {
  const headers = readProperty(err, "headers");
  const raw =
    headers instanceof Headers ? headers.get("retry-after") : readProperty(headers, "retry-after");
  if (typeof raw !== "string") return null;
  const seconds = Number(raw);
  return Number.isFinite(seconds) ? seconds : null;
}

/**
 * Map an error thrown by a provider SDK onto the error taxonomy. Errors that
 * are already `AppError`s pass through unchanged.
 */
export function classifyProviderError(err: unknown, service: string): AppError {
  if (AppError.isAppError(err)) {
    return err;
  }

  const name = readName(err);
  const message = readMessage(err);
  const codes = readCodes(err);
  const options = { cause: err };

  if (name === "AbortError" || name === "APIUserAbortError") {
    return new CancelledError(`${service} request aborted`, options);
  }

  const status = readStatus(err);

  if (status === 401 || status === 403) {
    return new PermanentProviderError(message, service, "invalid-credential", options);
  }

  if (status === 429) {
    if (codes.some((code) => QUOTA_CODES.has(code))) {
      return new ResourceExhaustedError(message, `${service}-quota`, options);
    }
    return new RateLimitedError(message, service, readRetryAfter(err), options);
  }

  if (status === 400 || status === 404 || status === 413 || status === 422) {
    if (codes.some((code) => CONTENT_POLICY_CODES.has(code))) {
      return new PermanentProviderError(message, service, "content-rejected", options);
    }
    if (status === 413) {
      return new PermanentProviderError(message, service, "unsupported-input", options);
    }
    return new PermanentProviderError(message, service, "bad-request", options);
  }

  if (status === 408 || status === 409 || (status !== undefined && status >= 500)) {
    return new TransientProviderError(message, service, options);
  }

  if (
    NETWORK_ERROR_NAMES.has(name) ||
    codes.some((code) => NETWORK_ERROR_CODES.has(code.toUpperCase()))
  ) {
    return new TransientProviderError(message, service, options);
  }

  if (status !== undefined) {
    return new PermanentProviderError(message, service, "bad-request", options);
  }

  return new AppError({
    message,
    statusCode: 500,
    code: "INTERNAL",
    kind: "internal",
    isOperational: false,
    cause: err,
  });
}
