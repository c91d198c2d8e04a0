import { setTimeout as sleep } from "node:timers/promises";
import { buildChunks, type ChunkingOptions } from "./chunking/index.js";
import type { Collection } from "./collection.js";
import type { EmbeddingGateway } from "./embedding-service.js";
import { GatewayUnavailableError, IngestionError, errorMessage } from "./errors.js";
import type { Analysis, Chunk, IngestionResult, LogFn, RawDocument } from "./types.js";

export interface IngestionOptions {
  chunking: ChunkingOptions;
  /** Extra attempts after a GatewayUnavailableError. */
  retries: number;
  /** First backoff delay; doubles per attempt. */
  retryBaseDelayMs: number;
  log?: LogFn;
}

function countKinds(documentId: string, chunks: Chunk[]): IngestionResult {
  const count = (kind: Chunk["kind"]) => chunks.filter((c) => c.kind === kind).length;
  return {
    documentId,
    analysisChunks: count("analysis"),
    dataChunks: count("data"),
    textChunks: count("plain_text"),
    totalChunks: chunks.length,
  };
}

/**
 * The only way chunks enter a collection. A document is chunked, embedded in
 * one gateway call and inserted as a unit, or not inserted at all.
 */
export class IngestionOrchestrator {
  private readonly log: LogFn;

  constructor(
    private readonly collection: Collection,
    private readonly embeddings: EmbeddingGateway,
    private readonly options: IngestionOptions,
  ) {
    this.log = options.log ?? (() => {});
  }

  async ingest(document: RawDocument, analysis?: Analysis): Promise<IngestionResult> {
    if (this.collection.hasDocument(document.id)) {
      throw new IngestionError("Document already in collection; remove it first", {
        documentId: document.id,
        operation: "ingest",
      });
    }

    const { chunks, vectors } = await this.prepare(document, analysis);
    await this.collection.add(chunks, vectors);

    const result = countKinds(document.id, chunks);
    this.log(
      `RAG: ingested ${document.id}: ${result.analysisChunks} analysis, ` +
        `${result.dataChunks} data, ${result.textChunks} text chunks`,
    );
    return result;
  }

  /**
   * Re-ingests a document that may already be present. The new chunks are
   * built and embedded before the old ones are touched, then swapped in one
   * collection write; any failure leaves the previous version indexed.
   */
  async replace(document: RawDocument, analysis?: Analysis): Promise<IngestionResult> {
    const { chunks, vectors } = await this.prepare(document, analysis);
    const removed = await this.collection.replace(document.id, chunks, vectors);

    const result = countKinds(document.id, chunks);
    this.log(`RAG: replaced ${removed} chunk(s) of ${document.id} with ${result.totalChunks}`);
    return result;
  }

  async removeDocument(documentId: string): Promise<number> {
    const removed = await this.collection.removeBySourceDocument(documentId);
    this.log(`RAG: removed ${removed} chunk(s) of ${documentId}`);
    return removed;
  }

  private async prepare(
    document: RawDocument,
    analysis: Analysis | undefined,
  ): Promise<{ chunks: Chunk[]; vectors: number[][] }> {
    // EmptyDocumentError and MissingAnalysisError propagate for the caller to decide
    const chunks = buildChunks(document, analysis, this.options.chunking);
    this.log(`RAG: embedding ${document.id} (${chunks.length} chunks)...`);
    return { chunks, vectors: await this.embedAll(document.id, chunks) };
  }

  private async embedAll(documentId: string, chunks: Chunk[]): Promise<number[][]> {
    const texts = chunks.map((c) => c.text);
    let vectors: number[][];
    try {
      vectors = await this.embedWithRetry(documentId, texts);
    } catch (err) {
      throw new IngestionError(
        `Embedding failed, nothing inserted: ${errorMessage(err)}`,
        { documentId, operation: "ingest.embed" },
        { cause: err },
      );
    }

    if (vectors.length !== chunks.length) {
      throw new IngestionError(`Gateway returned ${vectors.length} vectors for ${chunks.length} chunks`, {
        documentId,
        operation: "ingest.embed",
      });
    }
    const dimension = vectors[0]?.length ?? 0;
    vectors.forEach((vector, i) => {
      const chunkId = chunks[i]?.id;
      if (!vector || vector.length === 0 || vector.length !== dimension) {
        throw new IngestionError("Gateway returned a missing or ragged vector", {
          documentId,
          chunkId,
          operation: "ingest.embed",
        });
      }
      if (!vector.every(Number.isFinite)) {
        throw new IngestionError("Gateway returned a non-finite vector", {
          documentId,
          chunkId,
          operation: "ingest.embed",
        });
      }
    });
    return vectors;
  }

  private async embedWithRetry(documentId: string, texts: string[]): Promise<number[][]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.embeddings.embed(texts);
      } catch (err) {
        if (!(err instanceof GatewayUnavailableError) || attempt >= this.options.retries) throw err;
        const delay = this.options.retryBaseDelayMs * 2 ** attempt;
        this.log(
          `RAG: embedding ${documentId} failed (${errorMessage(err)}), ` +
            `retry ${attempt + 1}/${this.options.retries} in ${delay}ms`,
        );
        await sleep(delay);
      }
    }
  }
}
