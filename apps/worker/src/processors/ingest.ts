import { z } from "zod";
import type { IngestJobData } from "@docchat/types";
import { ValidationError } from "@docchat/errors";
import type { DocumentPipeline } from "@docchat/core";
import type { Logger } from "@docchat/logger";

const ingestJobSchema = z.object({
  type: z.literal("ingest"),
  documentId: z.string().min(1),
});

export function parseIngestJob(data: unknown): IngestJobData {
  const result = ingestJobSchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(
      "Malformed ingest job",
      Object.fromEntries(result.error.issues.map((issue) => [issue.path.join("."), issue.message])),
    );
  }
  return result.data;
}

/**
 * Ingest job processor.
 *
 * Runs every stage of the document pipeline. Processing failures end up on
 * the document, so the job itself only fails on malformed data.
 */
export async function processIngest(
  data: unknown,
  pipeline: Pick<DocumentPipeline, "process">,
  logger?: Logger,
  signal?: AbortSignal,
): Promise<void> {
  const { documentId } = parseIngestJob(data);
  logger?.debug({ documentId }, "Processing document");
  await pipeline.process(documentId, { signal });
}
