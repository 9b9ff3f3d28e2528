export type JobType = "ingest";

export interface IngestJobData {
  type: "ingest";
  documentId: string;
}

export interface DocumentJobDispatcher {
  dispatch(documentId: string): Promise<void>;
}
