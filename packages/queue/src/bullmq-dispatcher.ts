import type { DocumentJobDispatcher, IngestJobData } from "@docchat/types";
import type { Logger } from "@docchat/logger";

/** The part of a BullMQ `Queue` the dispatcher needs. */
export interface JobQueue {
  add(name: string, data: IngestJobData): Promise<unknown>;
}

export class BullMqDispatcher implements DocumentJobDispatcher {
  constructor(
    private readonly queue: JobQueue,
    private readonly logger?: Logger,
  ) {}

  async dispatch(documentId: string): Promise<void> {
    await this.queue.add("ingest", { type: "ingest", documentId });
    this.logger?.debug({ documentId }, "Ingest job enqueued");
  }
}
