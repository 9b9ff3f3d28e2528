import { CancelledError } from "@docchat/errors";

export type Release = () => void;

/**
 * One exclusive holder per key; waiters are served in arrival order. Keys
 * without holders or waiters take no memory.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Resolves with a release function once every earlier holder of `key` has
   * released. Aborting `signal` while waiting rejects with `CancelledError`
   * and gives up the place in line.
   */
  acquire(key: string, signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    let released = false;
    const release: Release = () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };

    return new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => reject(new CancelledError());
      signal?.addEventListener("abort", onAbort, { once: true });
      void previous.then(() => {
        signal?.removeEventListener("abort", onAbort);
        if (signal?.aborted) {
          release();
          return;
        }
        resolve(release);
      });
    });
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
