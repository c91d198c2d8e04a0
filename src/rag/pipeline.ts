import { rm, stat } from "node:fs/promises";
import path from "node:path";
import { DocumentAnalyzer } from "./analyzer.js";
import { chunkingSignature, type ChunkingOptions } from "./chunking/index.js";
import { Collection, type CollectionStats } from "./collection.js";
import { RAG_CONFIG, type RagConfig } from "./config.js";
import { buildContext, formatSourcesForUI } from "./context-builder.js";
import type { EmbeddingGateway } from "./embedding-service.js";
import {
  CollectionUnavailableError,
  ConsistencyError,
  DimensionMismatchError,
  EmptyDocumentError,
  errorMessage,
} from "./errors.js";
import { documentIdFor, extractFile } from "./extraction/index.js";
import { hashFile, saveManifest, scanFiles } from "./file-scanner.js";
import { IngestionOrchestrator } from "./ingestion.js";
import type { ChatMessage, LlmGateway } from "./llm-gateway.js";
import { LlmReranker } from "./reranker.js";
import { retrieve, type RetrievalOptions } from "./retriever.js";
import type { Analysis, IngestionResult, LogFn, Manifest, ScoredChunk } from "./types.js";

export const SYSTEM_PROMPT =
  "You are a helpful assistant for questions about the user's documents and data. Be concise and direct.";

export interface RagServices {
  embeddings: EmbeddingGateway;
  llm: LlmGateway;
}

export interface QueryResult {
  results: ScoredChunk[];
  contextSuffix: string | null;
  sourcesLine: string | null;
}

export interface AnswerOptions {
  history?: ChatMessage[];
  signal?: AbortSignal;
}

export interface RagAnswer {
  sourcesLine: string | null;
  tokens: AsyncIterable<string>;
}

export interface RagStats extends CollectionStats {
  files: number;
}

export interface RagPipeline {
  query(question: string): Promise<QueryResult>;
  /** Retrieves context, then streams the chat model's reply. */
  answer(question: string, options?: AnswerOptions): Promise<RagAnswer>;
  /** Ingests (or re-ingests) one file. Resolves null when it has nothing to chunk. */
  ingestFile(filePath: string): Promise<IngestionResult | null>;
  /** Removes a file's chunks, by path or document id. */
  removeDocument(pathOrId: string): Promise<number>;
  /** Empties the collection and re-ingests every tracked file; clears a halt. */
  rebuild(): Promise<RagStats>;
  setRerank(enabled: boolean): void;
  readonly rerankEnabled: boolean;
  stats(): RagStats;
  close(): Promise<void>;
}

/** Errors after which the collection cannot be trusted; startup stops on these. */
function isFatal(err: unknown): boolean {
  return (
    err instanceof ConsistencyError ||
    err instanceof DimensionMismatchError ||
    err instanceof CollectionUnavailableError
  );
}

export function chunkingOptionsFrom(config: RagConfig): ChunkingOptions {
  return {
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    rowBatchSize: config.rowBatchSize,
    analysisExcerptChars: config.analysisExcerptChars,
    interpretationExcerptChars: config.interpretationExcerptChars,
  };
}

export async function initRagPipeline(
  services: RagServices,
  log: LogFn,
  config: RagConfig = RAG_CONFIG,
): Promise<RagPipeline> {
  const { embeddings, llm } = services;
  const chunking = chunkingOptionsFrom(config);
  const signature = chunkingSignature(chunking);

  let collection: Collection;
  let unreadable = false;
  try {
    collection = await Collection.open({ dir: config.collectionDir, log });
  } catch (err) {
    if (!(err instanceof ConsistencyError)) throw err;
    log(`RAG: stored collection is unusable (${err.message}), rebuilding from source files`);
    await rm(config.collectionDir, { recursive: true, force: true });
    collection = await Collection.open({ dir: config.collectionDir, log });
    unreadable = true;
  }
  const orchestrator = new IngestionOrchestrator(collection, embeddings, {
    chunking,
    retries: config.ingestRetries,
    retryBaseDelayMs: config.ingestRetryBaseDelayMs,
    log,
  });
  const analyzer = new DocumentAnalyzer(llm, { previewChars: config.analysisPreviewChars, log });
  const reranker = new LlmReranker(llm, { model: config.rerankModel, log });
  let rerank = config.rerank;

  log(`RAG: scanning ${config.dataDir}...`);
  const { result: scanResult, manifest } = await scanFiles({
    dataDir: config.dataDir,
    manifestPath: config.manifestPath,
    embeddingModel: embeddings.model,
    chunkingSignature: signature,
    log,
  });

  // Vectors from another model cannot share an index with new ones.
  const staleModel = Object.values(manifest).some((e) => e.embeddingModel !== embeddings.model);
  if (staleModel) {
    log(`RAG: embedding model changed to ${embeddings.model}, rebuilding the collection`);
  }
  if (staleModel || unreadable) {
    await collection.reset();
    for (const filePath of Object.keys(manifest)) {
      if (!scanResult.deleted.includes(filePath)) scanResult.newOrChanged.push(filePath);
      delete manifest[filePath];
    }
    scanResult.unchanged = [];
  } else {
    // A manifest entry only counts while the collection still holds its chunks.
    const indexed = new Set(collection.documentIds());
    scanResult.unchanged = scanResult.unchanged.filter((filePath) => {
      const entry = manifest[filePath];
      if (entry && indexed.has(entry.documentId)) return true;
      scanResult.newOrChanged.push(filePath);
      return false;
    });
  }
  scanResult.newOrChanged = [...new Set(scanResult.newOrChanged)].sort();

  async function removeTracked(filePath: string): Promise<number> {
    const entry = manifest[filePath];
    const documentId = entry?.documentId ?? documentIdFor(filePath);
    const removed = await orchestrator.removeDocument(documentId);
    delete manifest[filePath];
    await saveManifest(config.manifestPath, manifest);
    return removed;
  }

  async function ingestFile(filePath: string): Promise<IngestionResult | null> {
    const absolute = path.resolve(filePath);
    const fileName = path.basename(absolute);

    log(`RAG: extracting ${fileName}...`);
    const document = await extractFile(absolute);

    let analysis: Analysis | undefined;
    if (document.messy) {
      log(`RAG: ${fileName} looks messy, analyzing its structure...`);
      analysis = await analyzer.analyze(document);
    }

    // The previous version stays indexed until its replacement is embedded.
    let result: IngestionResult;
    try {
      result = collection.hasDocument(document.id)
        ? await orchestrator.replace(document, analysis)
        : await orchestrator.ingest(document, analysis);
    } catch (err) {
      if (!(err instanceof EmptyDocumentError)) throw err;
      log(`RAG: ${fileName} produced no chunks, skipping`);
      if (manifest[absolute] || collection.hasDocument(document.id)) await removeTracked(absolute);
      return null;
    }

    const [fileStat, hash] = await Promise.all([stat(absolute), hashFile(absolute)]);
    manifest[absolute] = {
      hash,
      documentId: document.id,
      chunkCount: result.totalChunks,
      embeddingModel: embeddings.model,
      chunkingSignature: signature,
      messy: document.messy,
      mtime: fileStat.mtimeMs,
      size: fileStat.size,
    };
    await saveManifest(config.manifestPath, manifest);
    log(`RAG: ${fileName} done (${result.totalChunks} chunks)`);
    return result;
  }

  if (scanResult.deleted.length > 0) {
    log(`RAG: cleaning up ${scanResult.deleted.length} deleted file(s)`);
    for (const filePath of scanResult.deleted) {
      await removeTracked(filePath);
    }
  }

  await dropOrphans(collection, manifest, orchestrator);

  async function ingestAll(filePaths: string[]): Promise<void> {
    if (filePaths.length > 0) {
      log(`RAG: processing ${filePaths.length} new/changed file(s)`);
    }
    for (const filePath of filePaths) {
      try {
        await ingestFile(filePath);
      } catch (err) {
        if (isFatal(err)) throw err;
        log(`RAG: failed to ingest ${path.basename(filePath)}, skipping: ${errorMessage(err)}`);
      }
    }
  }

  await ingestAll(scanResult.newOrChanged);

  if (scanResult.unchanged.length > 0) {
    log(`RAG: ${scanResult.unchanged.length} file(s) cached, skipping`);
  }
  await saveManifest(config.manifestPath, manifest);

  const ready = collection.stats();
  log(`RAG ready: ${ready.documents} document(s), ${ready.chunks} chunks`);

  function retrievalOptions(): Partial<RetrievalOptions> {
    return {
      topK: config.topK,
      similarityThreshold: config.similarityThreshold,
      oversampleFactor: config.oversampleFactor,
      hybrid: config.hybrid,
      keywordBoost: config.keywordBoost,
      minKeywordOverlap: config.minKeywordOverlap,
      rerank,
      rerankTimeoutMs: config.rerankTimeoutMs,
      queryPrefix: config.queryPrefix,
    };
  }

  async function query(question: string): Promise<QueryResult> {
    const results = await retrieve(question, { collection, embeddings, reranker, log }, retrievalOptions());
    const context = buildContext(results, config.maxContextChars);
    if (!context) return { results, contextSuffix: null, sourcesLine: null };
    return {
      results,
      contextSuffix: context.systemSuffix,
      sourcesLine: formatSourcesForUI(context.sources),
    };
  }

  function stats(): RagStats {
    return { ...collection.stats(), files: Object.keys(manifest).length };
  }

  async function rebuild(): Promise<RagStats> {
    log("RAG: rebuilding the collection from source files");
    const { result } = await scanFiles({
      dataDir: config.dataDir,
      manifestPath: config.manifestPath,
      embeddingModel: embeddings.model,
      chunkingSignature: signature,
      log,
    });
    await collection.reset();
    for (const filePath of Object.keys(manifest)) delete manifest[filePath];
    await saveManifest(config.manifestPath, manifest);

    await ingestAll([...new Set([...result.newOrChanged, ...result.unchanged])].sort());
    const rebuilt = stats();
    log(`RAG ready: ${rebuilt.documents} document(s), ${rebuilt.chunks} chunks`);
    return rebuilt;
  }

  return {
    query,
    async answer(question, options = {}) {
      const { contextSuffix, sourcesLine } = await query(question);
      const tokens = llm.stream(question, {
        model: config.chatModel,
        system: SYSTEM_PROMPT + (contextSuffix ?? ""),
        history: options.history,
        signal: options.signal,
      });
      return { sourcesLine, tokens };
    },
    ingestFile,
    async removeDocument(pathOrId) {
      const absolute = path.resolve(pathOrId);
      const tracked = manifest[absolute]
        ? absolute
        : Object.keys(manifest).find((filePath) => manifest[filePath]?.documentId === pathOrId);
      if (tracked) return removeTracked(tracked);
      return orchestrator.removeDocument(pathOrId);
    },
    rebuild,
    setRerank(enabled) {
      rerank = enabled;
    },
    get rerankEnabled() {
      return rerank;
    },
    stats,
    close: () => collection.close(),
  };
}

/** Documents left in the collection with no manifest entry, e.g. after the manifest was lost. */
async function dropOrphans(
  collection: Collection,
  manifest: Manifest,
  orchestrator: IngestionOrchestrator,
): Promise<void> {
  const tracked = new Set(Object.values(manifest).map((e) => e.documentId));
  for (const documentId of collection.documentIds()) {
    if (!tracked.has(documentId)) await orchestrator.removeDocument(documentId);
  }
}
