import type { Collection } from "./collection.js";
import type { EmbeddingGateway } from "./embedding-service.js";
import { GatewayResponseError, errorMessage } from "./errors.js";
import { keywordOverlap, queryTerms } from "./lexical-search.js";
import { noopReranker, type Reranker } from "./reranker.js";
import type { LogFn, ScoredChunk } from "./types.js";

export interface RetrievalContext {
  collection: Collection;
  embeddings: EmbeddingGateway;
  reranker?: Reranker;
  log?: LogFn;
}

export interface RetrievalOptions {
  topK: number;
  /** Inclusive lower bound on similarity. Zero or below disables filtering. */
  similarityThreshold: number;
  oversampleFactor: number;
  hybrid: boolean;
  keywordBoost: number;
  minKeywordOverlap: number;
  rerank: boolean;
  rerankTimeoutMs: number;
  queryPrefix: string;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  topK: 5,
  similarityThreshold: 0,
  oversampleFactor: 3,
  hybrid: true,
  keywordBoost: 0.1,
  minKeywordOverlap: 0.5,
  rerank: false,
  rerankTimeoutMs: 15_000,
  queryPrefix: "",
};

/** Cosine distance → similarity in [0, 1]; opposite directions count as 0. */
export function similarityFromDistance(distance: number): number {
  return Math.min(1, Math.max(0, 1 - distance));
}

function byScore(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}

/**
 * Promotes candidates sharing enough of the query's terms:
 * `min(1, score × (1 + boost × overlap))`, so boosted scores stay on the
 * same [0, 1] scale as similarities and rerank scores.
 */
export function applyKeywordBoost(
  query: string,
  candidates: ScoredChunk[],
  boost: number,
  minOverlap: number,
): ScoredChunk[] {
  const terms = queryTerms(query);
  if (terms.length === 0 || boost <= 0) return candidates;
  return candidates
    .map((c) => {
      const overlap = keywordOverlap(terms, c.chunk.text);
      return overlap >= minOverlap && overlap > 0 ? { ...c, score: Math.min(1, c.score * (1 + boost * overlap)) } : c;
    })
    .sort(byScore);
}

async function rerankBestEffort(
  query: string,
  candidates: ScoredChunk[],
  reranker: Reranker,
  timeoutMs: number,
  log: LogFn,
): Promise<ScoredChunk[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`rerank timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([reranker.rerank(query, candidates, controller.signal), timeout]);
  } catch (err) {
    log(`RAG: ${reranker.name} rerank skipped, keeping similarity order: ${errorMessage(err)}`);
    return candidates;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Ranked chunks for a query. An empty list means nothing relevant was found;
 * an unavailable collection throws instead.
 */
export async function retrieve(
  query: string,
  context: RetrievalContext,
  options: Partial<RetrievalOptions> = {},
): Promise<ScoredChunk[]> {
  const opts = { ...DEFAULT_RETRIEVAL_OPTIONS, ...options };
  const { collection, embeddings } = context;
  const reranker = context.reranker ?? noopReranker;
  const log = context.log ?? (() => {});

  if (opts.topK <= 0) return [];

  const [queryVector] = await embeddings.embed([opts.queryPrefix + query]);
  if (!queryVector) {
    throw new GatewayResponseError("Embedding gateway returned no query vector", { operation: "retrieve" });
  }

  const hits = await collection.search(queryVector, opts.topK * opts.oversampleFactor);
  let candidates: ScoredChunk[] = hits.map((h) => ({
    chunk: h.chunk,
    score: similarityFromDistance(h.distance),
  }));
  const before = candidates.length;

  if (opts.similarityThreshold > 0) {
    candidates = candidates.filter((c) => c.score >= opts.similarityThreshold);
  }
  if (opts.hybrid) {
    candidates = applyKeywordBoost(query, candidates, opts.keywordBoost, opts.minKeywordOverlap);
  }
  if (opts.rerank && candidates.length > 1) {
    candidates = await rerankBestEffort(query, candidates, reranker, opts.rerankTimeoutMs, log);
  }

  const results = candidates.slice(0, opts.topK);
  const { vectors, chunks } = collection.stats();
  log(
    `RAG: retrieved ${results.length} of ${before} candidates ` +
      `(${candidates.length} after filtering, threshold=${opts.similarityThreshold}, ` +
      `index=${vectors}, metadata=${chunks})`,
  );
  return results;
}
