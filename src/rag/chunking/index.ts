import { EmptyDocumentError } from "../errors.js";
import type { Analysis, Chunk, RawDocument } from "../types.js";
import { TabularChunker } from "./tabular-chunker.js";
import { TextChunker } from "./text-chunker.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

// Checked in registration order; the first strategy that accepts wins.
const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function selectChunkingStrategy(
  document: RawDocument,
  analysis: Analysis | undefined,
): ChunkingStrategy {
  for (const strategy of registry.values()) {
    if (strategy.accepts(document, analysis)) return strategy;
  }
  throw new Error(`No chunking strategy accepts document ${document.id}`);
}

function validateOptions(options: ChunkingOptions): void {
  if (options.chunkSize < 1) {
    throw new RangeError(`chunkSize must be positive, got ${options.chunkSize}`);
  }
  if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
    throw new RangeError(
      `chunkOverlap must be in [0, ${options.chunkSize}), got ${options.chunkOverlap}`,
    );
  }
  if (options.rowBatchSize < 1) {
    throw new RangeError(`rowBatchSize must be positive, got ${options.rowBatchSize}`);
  }
}

export function isEmptyDocument(document: RawDocument): boolean {
  return !document.rawText.trim() && document.tables.every((t) => t.rows.length === 0);
}

/**
 * Deterministically turns a document (and its analysis, if any) into ordered
 * chunks whose text is everything that will be embedded for them.
 */
export function buildChunks(
  document: RawDocument,
  analysis: Analysis | undefined,
  options: ChunkingOptions,
): Chunk[] {
  validateOptions(options);
  if (isEmptyDocument(document)) {
    throw new EmptyDocumentError("Document has no text and no table rows", {
      documentId: document.id,
      operation: "chunk",
    });
  }
  return selectChunkingStrategy(document, analysis).chunk(document, analysis, options);
}

/** Stable fingerprint of the options, stored in the manifest to detect re-chunking. */
export function chunkingSignature(options: ChunkingOptions): string {
  return [
    options.chunkSize,
    options.chunkOverlap,
    options.rowBatchSize,
    options.analysisExcerptChars,
    options.interpretationExcerptChars,
  ].join("/");
}

registerChunkingStrategy(new TabularChunker());
registerChunkingStrategy(new TextChunker());

export { splitWindows } from "./text-chunker.js";
export type { ChunkingOptions, ChunkingStrategy } from "./types.js";
