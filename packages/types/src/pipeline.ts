export interface VectorRecord {
  chunkId: string;
  documentId: string;
  ownerId: string;
  chunkIndex: number;
  documentCreatedAt: Date;
  /** `<provider>:<model>`; vectors are only comparable within one key. */
  embeddingModel: string;
  vector: number[];
  /** Hidden until every vector of the document has been written. */
  visible: boolean;
}

export interface VectorSearchParams {
  ownerId: string;
  /** Documents the caller may see. An empty list yields no results. */
  documentIds: string[];
  vector: number[];
  embeddingModel: string;
  topK: number;
}

export interface VectorSearchResult {
  chunkId: string;
  documentId: string;
  chunkIndex: number;
  score: number;
}

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}
