import path from "node:path";
import { z } from "zod";

const DEFAULTS = {
  dataDir: "data",
  cacheDir: ".rag-cache",
  apiBaseUrl: "https://openrouter.ai/api/v1",

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  requestTimeoutMs: 60_000,

  chatModel: "qwen/qwen3.5-122b-a10b",
  rerankModel: "qwen/qwen3.5-27b",

  queryPrefix: "Instruct: Retrieve relevant document passages\nQuery: ",

  topK: 5,
  similarityThreshold: 0,
  oversampleFactor: 3,
  hybrid: true,
  keywordBoost: 0.1,
  minKeywordOverlap: 0.5,
  rerank: false,
  rerankTimeoutMs: 15_000,

  chunkSize: 1000,
  chunkOverlap: 200,
  rowBatchSize: 25,
  analysisExcerptChars: 600,
  interpretationExcerptChars: 300,
  analysisPreviewChars: 10_000,

  ingestRetries: 3,
  ingestRetryBaseDelayMs: 500,

  maxContextChars: 16_000,
};

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  RAG_DATA_DIR: z.string().min(1).optional(),
  RAG_CACHE_DIR: z.string().min(1).optional(),
  RAG_API_BASE_URL: z.string().url().optional(),
  RAG_EMBEDDING_MODEL: z.string().min(1).optional(),
  RAG_EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().optional(),
  RAG_EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().optional(),
  RAG_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RAG_CHAT_MODEL: z.string().min(1).optional(),
  RAG_RERANK_MODEL: z.string().min(1).optional(),
  RAG_QUERY_PREFIX: z.string().optional(),
  RAG_TOP_K: z.coerce.number().int().positive().optional(),
  RAG_SIMILARITY_THRESHOLD: z.coerce.number().max(1).optional(),
  RAG_OVERSAMPLE_FACTOR: z.coerce.number().int().positive().optional(),
  RAG_HYBRID: flag.optional(),
  RAG_KEYWORD_BOOST: z.coerce.number().nonnegative().optional(),
  RAG_MIN_KEYWORD_OVERLAP: z.coerce.number().min(0).max(1).optional(),
  RAG_RERANK: flag.optional(),
  RAG_RERANK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().optional(),
  RAG_ROW_BATCH_SIZE: z.coerce.number().int().positive().optional(),
  RAG_INGEST_RETRIES: z.coerce.number().int().nonnegative().optional(),
});

export type RagConfig = ReturnType<typeof loadRagConfig>;

export function loadRagConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") ?? "environment";
    throw new Error(`Invalid ${name}: ${issue?.message ?? "unknown error"}`);
  }
  const e = parsed.data;

  const cacheDir = path.resolve(e.RAG_CACHE_DIR ?? DEFAULTS.cacheDir);
  const config = {
    ...DEFAULTS,
    dataDir: path.resolve(e.RAG_DATA_DIR ?? DEFAULTS.dataDir),
    cacheDir,
    collectionDir: path.join(cacheDir, "collection"),
    manifestPath: path.join(cacheDir, "manifest.json"),
    apiBaseUrl: e.RAG_API_BASE_URL ?? DEFAULTS.apiBaseUrl,
    embeddingModel: e.RAG_EMBEDDING_MODEL ?? DEFAULTS.embeddingModel,
    embeddingBatchSize: e.RAG_EMBEDDING_BATCH_SIZE ?? DEFAULTS.embeddingBatchSize,
    embeddingConcurrency: e.RAG_EMBEDDING_CONCURRENCY ?? DEFAULTS.embeddingConcurrency,
    requestTimeoutMs: e.RAG_REQUEST_TIMEOUT_MS ?? DEFAULTS.requestTimeoutMs,
    chatModel: e.RAG_CHAT_MODEL ?? DEFAULTS.chatModel,
    rerankModel: e.RAG_RERANK_MODEL ?? DEFAULTS.rerankModel,
    queryPrefix: e.RAG_QUERY_PREFIX ?? DEFAULTS.queryPrefix,
    topK: e.RAG_TOP_K ?? DEFAULTS.topK,
    similarityThreshold: e.RAG_SIMILARITY_THRESHOLD ?? DEFAULTS.similarityThreshold,
    oversampleFactor: e.RAG_OVERSAMPLE_FACTOR ?? DEFAULTS.oversampleFactor,
    hybrid: e.RAG_HYBRID ?? DEFAULTS.hybrid,
    keywordBoost: e.RAG_KEYWORD_BOOST ?? DEFAULTS.keywordBoost,
    minKeywordOverlap: e.RAG_MIN_KEYWORD_OVERLAP ?? DEFAULTS.minKeywordOverlap,
    rerank: e.RAG_RERANK ?? DEFAULTS.rerank,
    rerankTimeoutMs: e.RAG_RERANK_TIMEOUT_MS ?? DEFAULTS.rerankTimeoutMs,
    chunkSize: e.RAG_CHUNK_SIZE ?? DEFAULTS.chunkSize,
    chunkOverlap: e.RAG_CHUNK_OVERLAP ?? DEFAULTS.chunkOverlap,
    rowBatchSize: e.RAG_ROW_BATCH_SIZE ?? DEFAULTS.rowBatchSize,
    ingestRetries: e.RAG_INGEST_RETRIES ?? DEFAULTS.ingestRetries,
  };

  if (config.chunkOverlap >= config.chunkSize) {
    throw new Error(
      `Invalid RAG_CHUNK_OVERLAP: ${config.chunkOverlap} must be smaller than chunk size ${config.chunkSize}`,
    );
  }
  return config;
}

export const RAG_CONFIG = loadRagConfig();
