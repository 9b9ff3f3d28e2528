import { AppError } from "./app-error.js";
import { CancelledError, ProviderRetriesExhaustedError, RateLimitedError } from "./errors.js";

export interface RetryAttempt {
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Name used in the exhaustion error. Default: "provider" */
  service?: string;
  /** Aborting stops further attempts and rejects with `CancelledError`. */
  signal?: AbortSignal;
  /** Called before each backoff sleep. */
  onRetry?: (info: RetryAttempt) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs" | "service">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  service: "provider",
};

/**
 * Only errors that declare themselves retryable are retried. Raw SDK errors
 * must go through `classifyProviderError` first.
 */
export function isRetryable(error: unknown): boolean {
  return AppError.isAppError(error) && error.retryable;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  // Add jitter: random value between 50% and 100% of the capped delay
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

/**
 * Backoff for a failed attempt. A rate limit with a `retry-after` hint waits
 * at least that long, still capped at `maxDelayMs`.
 */
function delayFor(error: unknown, attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const backoff = calculateDelay(attempt, baseDelayMs, maxDelayMs);
  if (error instanceof RateLimitedError && error.retryAfter !== null && error.retryAfter > 0) {
    return Math.min(maxDelayMs, Math.max(backoff, Math.ceil(error.retryAfter * 1000)));
  }
  return backoff;
}

/** Resolves after `ms`, or rejects with `CancelledError` once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * Non-retryable errors are rethrown as-is; running out of attempts throws
 * `ProviderRetriesExhaustedError` with the last error as its cause.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs, service } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  const signal = options?.signal;

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    try {
      return await fn();
    } catch (error: unknown) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxRetries) {
        throw new ProviderRetriesExhaustedError(service, attempt + 1, error);
      }

      const delayMs = delayFor(error, attempt, baseDelayMs, maxDelayMs);
      options?.onRetry?.({ attempt: attempt + 1, maxRetries, delayMs, error });
      await sleep(delayMs, signal);
    }
  }
}
