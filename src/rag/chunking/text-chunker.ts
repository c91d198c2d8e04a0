import type { Analysis, Chunk, RawDocument } from "../types.js";
import { buildAnalysisChunk, chunkId, renderTables, sourceName } from "./format.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

// Tried in order: paragraph → sentence → line → word.
const BOUNDARIES = ["\n\n", ". ", "! ", "? ", "\n", " "];

export interface TextWindow {
  start: number;
  end: number;
}

/**
 * Best place to end a window that would otherwise stop at `hardEnd`.
 * Only boundaries in the second half of the window are considered so that
 * windows keep roughly their target size.
 */
function boundaryBefore(text: string, start: number, hardEnd: number, size: number): number {
  const minEnd = start + Math.floor(size / 2);
  for (const sep of BOUNDARIES) {
    const idx = text.lastIndexOf(sep, hardEnd - sep.length);
    if (idx >= minEnd) return idx + sep.length;
  }
  return hardEnd;
}

/**
 * Overlapping windows of at most `size` chars covering the whole text.
 * Consecutive windows share `overlap` chars; a window that would lie
 * entirely inside its predecessor is never produced.
 */
export function splitWindows(text: string, size: number, overlap: number): TextWindow[] {
  const windows: TextWindow[] = [];
  let start = 0;
  while (start < text.length) {
    const hardEnd = Math.min(start + size, text.length);
    const end = hardEnd < text.length ? boundaryBefore(text, start, hardEnd, size) : hardEnd;
    windows.push({ start, end });
    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }
  return windows;
}

export class TextChunker implements ChunkingStrategy {
  readonly name = "plain-text";

  accepts(): boolean {
    return true;
  }

  chunk(document: RawDocument, analysis: Analysis | undefined, options: ChunkingOptions): Chunk[] {
    const chunks: Chunk[] = [];
    if (analysis) {
      chunks.push(buildAnalysisChunk(document, analysis, 0));
    }

    const text = document.rawText.trim() ? document.rawText : renderTables(document.tables);
    for (const { start, end } of splitWindows(text, options.chunkSize, options.chunkOverlap)) {
      const windowText = text.slice(start, end).trim();
      if (!windowText) continue;
      const order = chunks.length;
      chunks.push({
        id: chunkId(document.id, order),
        sourceDocumentId: document.id,
        kind: "plain_text",
        text: windowText,
        order,
        attributes: {
          source: sourceName(document),
          charStart: start,
          charEnd: end,
        },
      });
    }
    return chunks;
  }
}
