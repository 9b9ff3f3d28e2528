import type { CompletionRequest, CompletionResult, ProviderCallOptions } from "@docchat/types";
import {
  CancelledError,
  ProviderRetriesExhaustedError,
  calculateDelay,
  classifyProviderError,
  sleep,
  withRetry,
  withTimeout,
} from "@docchat/errors";
import type { Logger } from "@docchat/logger";
import type { ICompletionProvider } from "./completion-provider.interface.js";

export interface CompletionResilienceOptions {
  /** Whole call for `complete`; gap between fragments for `stream`. */
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  logger?: Logger;
}

/**
 * Adds timeouts and retries to a completion provider. A stream is only
 * retried while nothing has been yielded yet; once text has reached the
 * caller a failure is final.
 */
export class ResilientCompletionProvider implements ICompletionProvider {
  readonly name: ICompletionProvider["name"];
  readonly model: string;
  readonly contextFormat: ICompletionProvider["contextFormat"];

  constructor(
    private readonly inner: ICompletionProvider,
    private readonly options: CompletionResilienceOptions,
  ) {
    this.name = inner.name;
    this.model = inner.model;
    this.contextFormat = inner.contextFormat;
  }

  complete(request: CompletionRequest, options?: ProviderCallOptions): Promise<CompletionResult> {
    const { timeoutMs, maxRetries, retryBaseDelayMs, retryMaxDelayMs } = this.options;
    const service = this.name;

    return withRetry(
      () =>
        withTimeout(
          (signal) =>
            this.inner.complete(request, { signal }).catch((error: unknown) => {
              throw classifyProviderError(error, service);
            }),
          timeoutMs,
          { service, signal: options?.signal },
        ),
      {
        maxRetries,
        baseDelayMs: retryBaseDelayMs,
        maxDelayMs: retryMaxDelayMs,
        service,
        signal: options?.signal,
        onRetry: ({ attempt, delayMs, error }) => this.logRetry(attempt, delayMs, error),
      },
    );
  }

  async *stream(request: CompletionRequest, options?: ProviderCallOptions): AsyncGenerator<string> {
    const { timeoutMs, maxRetries, retryBaseDelayMs, retryMaxDelayMs } = this.options;
    const service = this.name;
    const callerSignal = options?.signal;

    for (let attempt = 0; ; attempt++) {
      if (callerSignal?.aborted) {
        throw new CancelledError();
      }

      const controller = new AbortController();
      const onAbort = (): void => controller.abort();
      callerSignal?.addEventListener("abort", onAbort, { once: true });
      let yielded = false;
      let finished = false;

      try {
        const iterator = this.inner.stream(request, { signal: controller.signal })[Symbol.asyncIterator]();
        for (;;) {
          const next = await withTimeout(() => iterator.next(), timeoutMs, {
            service,
            signal: callerSignal,
          });
          if (next.done) {
            finished = true;
            return;
          }
          yielded = true;
          yield next.value;
        }
      } catch (error) {
        const classified = classifyProviderError(error, service);
        if (yielded || !classified.retryable) {
          throw classified;
        }
        if (attempt >= maxRetries) {
          throw new ProviderRetriesExhaustedError(service, attempt + 1, classified);
        }
        const delayMs = calculateDelay(attempt, retryBaseDelayMs, retryMaxDelayMs);
        this.logRetry(attempt + 1, delayMs, classified);
        await sleep(delayMs, callerSignal);
      } finally {
        callerSignal?.removeEventListener("abort", onAbort);
        if (!finished) {
          // Abandoned, failed or timed out: drop the connection.
          controller.abort();
        }
      }
    }
  }

  private logRetry(attempt: number, delayMs: number, error: unknown): void {
    this.options.logger?.warn(
      {
        provider: this.name,
        model: this.model,
        attempt,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      },
      "Completion request failed, retrying",
    );
  }
}
