import type { Chunk, ScoredChunk } from "./types.js";

export interface RagContext {
  systemSuffix: string;
  sources: SourceRef[];
}

export interface SourceRef {
  source: string;
  labels: string[];
}

/** Where inside its source a chunk came from, as shown in citations. */
export function chunkLabel(chunk: Chunk): string {
  const { attributes } = chunk;
  switch (chunk.kind) {
    case "analysis":
      return "analysis";
    case "data":
      return `${attributes["table"] ?? "table"} rows ${attributes["rowStart"]}-${attributes["rowEnd"]}`;
    case "plain_text":
      return `part ${chunk.order + 1}`;
  }
}

function sourceOf(chunk: Chunk): string {
  return String(chunk.attributes["source"] ?? chunk.sourceDocumentId);
}

/**
 * System prompt suffix carrying the retrieved chunks, best first, cut off
 * once `maxChars` of excerpts have been added. The first chunk is always
 * included, truncated if it alone is over the limit.
 */
export function buildContext(results: ScoredChunk[], maxChars: number): RagContext | null {
  if (results.length === 0) return null;

  const parts: string[] = [];
  const included: Chunk[] = [];
  let used = 0;
  for (const { chunk } of results) {
    const part = `[Source: ${sourceOf(chunk)}, ${chunkLabel(chunk)}]\n${chunk.text}`;
    if (parts.length > 0 && used + part.length > maxChars) break;
    parts.push(part.length > maxChars ? part.slice(0, maxChars) : part);
    included.push(chunk);
    used += part.length;
  }

  const systemSuffix =
    "\n\n--- Retrieved Context ---\n" +
    "Use the following document excerpts to answer the user's question. " +
    "Analysis sections explain what messy data means; use them to interpret the raw rows. " +
    "Cite your sources using the [Source: file, ...] labels when referencing specific information.\n\n" +
    parts.join("\n\n");

  const sourceMap = new Map<string, string[]>();
  for (const chunk of included) {
    const key = sourceOf(chunk);
    const labels = sourceMap.get(key) ?? [];
    const label = chunkLabel(chunk);
    if (!labels.includes(label)) labels.push(label);
    sourceMap.set(key, labels);
  }

  const sources = [...sourceMap].map(([source, labels]) => ({ source, labels }));
  return { systemSuffix, sources };
}

export function formatSourcesForUI(sources: SourceRef[]): string {
  return sources.map((s) => `${s.source} (${s.labels.join(", ")})`).join(" | ");
}
