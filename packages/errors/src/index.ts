export { AppError, describeError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  InvalidTransitionError,
  ValidationError,
  UnsupportedTypeError,
  EmptyDocumentError,
  TransientProviderError,
  RateLimitedError,
  ProviderTimeoutError,
  ProviderRetriesExhaustedError,
  PermanentProviderError,
  ResourceExhaustedError,
  DimensionMismatchError,
  EmbeddingModelMismatchError,
  CancelledError,
} from "./errors.js";
export type { PermanentProviderReason } from "./errors.js";

export { withRetry, isRetryable, calculateDelay, sleep } from "./retry.js";
export type { RetryOptions, RetryAttempt } from "./retry.js";

export { withTimeout } from "./timeout.js";
export type { TimeoutOptions } from "./timeout.js";

export { classifyProviderError } from "./classify.js";
