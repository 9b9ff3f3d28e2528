export type ProcessingState =
  | "uploaded"
  | "extracting"
  | "chunking"
  | "embedding"
  | "indexed"
  | "failed";

export const PROCESSING_STATES: readonly ProcessingState[] = [
  "uploaded",
  "extracting",
  "chunking",
  "embedding",
  "indexed",
  "failed",
] as const;

export type ErrorKind =
  | "validation"
  | "unsupported-type"
  | "empty-document"
  | "not-found"
  | "conflict"
  | "transient-provider"
  | "transient-provider-exhausted"
  | "permanent-provider"
  | "resource-exhausted"
  | "dimension-mismatch"
  | "cancelled"
  | "internal";

export interface ProcessingError {
  kind: ErrorKind;
  message: string;
}

export interface DocumentRecord {
  id: string;
  ownerId: string;
  filename: string;
  mimeType: string;
  sizeBytes: number;
  state: ProcessingState;
  error: ProcessingError | null;
  chunkCount: number;
  /** `<provider>:<model>` of the embeddings currently backing this document. */
  embeddingModel: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface DocumentUpload {
  ownerId: string;
  filename: string;
  mimeType: string;
}

export interface DocumentStatus {
  state: ProcessingState;
  error: ProcessingError | null;
}

export interface DocumentListFilter {
  state?: ProcessingState;
}

export const SUPPORTED_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "application/pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
] as const;

export type SupportedMimeType = (typeof SUPPORTED_MIME_TYPES)[number];
