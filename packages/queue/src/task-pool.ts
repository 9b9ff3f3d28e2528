import type { DocumentJobDispatcher } from "@docchat/types";
import type { Logger } from "@docchat/logger";

export type DocumentTask = (documentId: string) => Promise<void>;

/**
 * Runs document tasks in this process with bounded concurrency. Tasks start
 * in dispatch order; `dispatch` returns as soon as the task is queued.
 */
export class InProcessTaskPool implements DocumentJobDispatcher {
  private readonly queue: string[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly task: DocumentTask,
    private readonly concurrency: number,
    private readonly logger?: Logger,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError("concurrency must be a positive integer");
    }
  }

  /** Tasks waiting for a free slot. */
  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.running;
  }

  dispatch(documentId: string): Promise<void> {
    this.queue.push(documentId);
    this.drain();
    return Promise.resolve();
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const documentId = this.queue.shift();
      if (documentId === undefined) break;
      this.running++;
      void this.run(documentId).finally(() => {
        this.running--;
        this.drain();
        this.notifyIdle();
      });
    }
  }

  private async run(documentId: string): Promise<void> {
    try {
      await this.task(documentId);
    } catch (error) {
      this.logger?.error(
        { documentId, error: error instanceof Error ? error.message : String(error) },
        "Document task failed",
      );
    }
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
