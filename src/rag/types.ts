export type ContentKind = "text" | "table" | "image-derived-text";

export interface Table {
  /** Sheet or table name, used in citations and data chunk headers. */
  name: string;
  columns: string[];
  rows: string[][];
}

export interface RawDocument {
  readonly id: string;
  readonly sourcePath: string;
  readonly contentKind: ContentKind;
  readonly rawText: string;
  readonly tables: readonly Table[];
  /** Tabular input that needs an AI interpretation before it is useful. */
  readonly messy: boolean;
}

export interface StructuredSummary {
  /** Column or field name → inferred meaning. */
  fields: Record<string, string>;
  patterns: string[];
  suggestedQuestions: string[];
}

export interface Analysis {
  summary: string;
  interpretation: string;
  structuredSummary: StructuredSummary;
}

export type ChunkKind = "analysis" | "data" | "plain_text";

export type AttributeValue = string | number | boolean;

export interface Chunk {
  id: string;
  sourceDocumentId: string;
  kind: ChunkKind;
  /** Exactly the string that was embedded. */
  text: string;
  order: number;
  attributes: Record<string, AttributeValue>;
}

export interface IndexEntry {
  vector: number[];
  chunkId: string;
}

export interface SearchHit {
  distance: number;
  chunkId: string;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface IngestionResult {
  documentId: string;
  analysisChunks: number;
  dataChunks: number;
  textChunks: number;
  totalChunks: number;
}

export interface ManifestEntry {
  hash: string;
  documentId: string;
  chunkCount: number;
  embeddingModel: string;
  chunkingSignature: string;
  messy: boolean;
  mtime: number;
  size: number;
}

export interface Manifest {
  [filePath: string]: ManifestEntry;
}

export type LogFn = (msg: string) => void;
