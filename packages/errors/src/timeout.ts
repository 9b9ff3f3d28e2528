import { CancelledError, ProviderTimeoutError } from "./errors.js";

export interface TimeoutOptions {
  /** Name reported in `ProviderTimeoutError`. Default: "provider" */
  service?: string;
  /** Caller's signal; aborting it aborts the call and rejects with `CancelledError`. */
  signal?: AbortSignal;
}

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when the caller's
 * signal aborts, whichever comes first. The returned promise settles as soon
 * as either happens, even if `fn` ignores its signal.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options?: TimeoutOptions,
): Promise<T> {
  const service = options?.service ?? "provider";
  const parent = options?.signal;

  if (parent?.aborted) {
    return Promise.reject(new CancelledError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      return true;
    };

    const onParentAbort = (): void => {
      if (!finish()) return;
      controller.abort();
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      if (!finish()) return;
      controller.abort();
      reject(new ProviderTimeoutError(service, timeoutMs));
    }, timeoutMs);

    parent?.addEventListener("abort", onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => {
        if (finish()) resolve(value);
      },
      (error: unknown) => {
        if (finish()) reject(error);
      },
    );
  });
}
