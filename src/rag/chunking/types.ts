import type { Analysis, Chunk, RawDocument } from "../types.js";

export interface ChunkingOptions {
  /** Characters per plain-text window. */
  chunkSize: number;
  /** Characters shared by consecutive windows. */
  chunkOverlap: number;
  /** Table rows per data chunk. */
  rowBatchSize: number;
  analysisExcerptChars: number;
  interpretationExcerptChars: number;
}

export interface ChunkingStrategy {
  readonly name: string;
  accepts(document: RawDocument, analysis: Analysis | undefined): boolean;
  chunk(document: RawDocument, analysis: Analysis | undefined, options: ChunkingOptions): Chunk[];
}
