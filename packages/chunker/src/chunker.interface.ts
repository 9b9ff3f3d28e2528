import type { ChunkResult, ChunkingConfig } from "@docchat/types";

export type ChunkWindowConfig = Pick<ChunkingConfig, "maxTokens" | "overlap">;

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkWindowConfig): ChunkResult[];
}
