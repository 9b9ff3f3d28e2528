export type ChunkStrategy = "fixed" | "recursive";

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  maxTokens: number;
  overlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: ChunkSpan;
}

export interface ChunkSpan {
  startChar: number;
  endChar: number;
  startToken: number;
  endToken: number;
  /** Tokens shared with the previous chunk. */
  overlapTokens: number;
}

export interface ChunkRecord extends ChunkSpan {
  id: string;
  documentId: string;
  ownerId: string;
  index: number;
  text: string;
  tokenCount: number;
}

export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  filename: string;
  chunkIndex: number;
  content: string;
  tokenCount: number;
  score: number;
}
