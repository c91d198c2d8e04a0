import type { LlmGateway } from "./llm-gateway.js";
import type { LogFn, ScoredChunk } from "./types.js";

/**
 * Optional second-stage ordering. Implementations return the candidates they
 * were given, reordered, with `score` replaced by their relevance in [0, 1].
 */
export interface Reranker {
  readonly name: string;
  rerank(query: string, candidates: ScoredChunk[], signal?: AbortSignal): Promise<ScoredChunk[]>;
}

export const noopReranker: Reranker = {
  name: "none",
  async rerank(_query, candidates) {
    return candidates;
  },
};

export interface LlmRerankerOptions {
  model?: string;
  /** Chunk text shown to the model per candidate. */
  maxChars?: number;
  log?: LogFn;
}

/** First number in the reply, clamped to [0, 1]; null when there is none. */
export function parseRelevance(reply: string): number | null {
  const match = /-?\d+(?:\.\d+)?/.exec(reply);
  if (!match) return null;
  const value = Number.parseFloat(match[0]);
  if (!Number.isFinite(value)) return null;
  return Math.min(1, Math.max(0, value));
}

/**
 * Asks the LLM for a 0–1 relevance score per candidate. A candidate whose
 * reply carries no number keeps its similarity score.
 */
export class LlmReranker implements Reranker {
  readonly name = "llm";

  constructor(
    private readonly llm: LlmGateway,
    private readonly options: LlmRerankerOptions = {},
  ) {}

  async rerank(query: string, candidates: ScoredChunk[], signal?: AbortSignal): Promise<ScoredChunk[]> {
    const maxChars = this.options.maxChars ?? 500;
    const scored = await Promise.all(
      candidates.map(async (candidate) => {
        const prompt =
          "How relevant is this text to answering the question? " +
          "Reply with a single number between 0 (irrelevant) and 1 (fully answers it).\n\n" +
          `Question: ${query}\n\nText: ${candidate.chunk.text.slice(0, maxChars)}\n\nRelevance:`;
        const reply = await this.llm.complete(prompt, {
          model: this.options.model,
          temperature: 0,
          maxTokens: 8,
          signal,
        });
        const relevance = parseRelevance(reply);
        if (relevance === null) {
          this.options.log?.(`RAG: rerank reply for ${candidate.chunk.id} had no score, keeping similarity`);
        }
        return { chunk: candidate.chunk, score: relevance ?? candidate.score };
      }),
    );
    // Array.prototype.sort is stable: equal relevance keeps similarity order
    return scored.sort((a, b) => b.score - a.score);
  }
}
