import { MissingAnalysisError } from "../errors.js";
import type { Analysis, Chunk, RawDocument, Table } from "../types.js";
import {
  bulletList,
  buildAnalysisChunk,
  chunkId,
  excerpt,
  fieldLines,
  isBlankAnalysis,
  renderRows,
  sourceName,
} from "./format.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Field meanings that describe this table's columns. Falls back to every
 * field when none match, e.g. when the analysis renamed unnamed columns.
 */
function relevantFields(fields: Record<string, string>, table: Table): Record<string, string> {
  const columns = new Set(table.columns.map(normalizeName));
  const matching = Object.fromEntries(
    Object.entries(fields).filter(([name]) => columns.has(normalizeName(name))),
  );
  return Object.keys(matching).length > 0 ? matching : fields;
}

function analysisExcerpt(analysis: Analysis, table: Table, maxChars: number): string {
  const lines = [`Summary: ${excerpt(analysis.summary, maxChars)}`];
  const fields = fieldLines(relevantFields(analysis.structuredSummary.fields, table));
  if (fields.length > 0) lines.push(`Field meanings:\n${bulletList(fields)}`);
  const { patterns } = analysis.structuredSummary;
  if (patterns.length > 0) lines.push(`Patterns:\n${bulletList(patterns)}`);
  return lines.join("\n");
}

/**
 * Messy tabular input: one analysis chunk, then one data chunk per row batch.
 * Every data chunk embeds the analysis and interpretation next to its rows
 * so questions about what the data means can match the rows themselves.
 */
export class TabularChunker implements ChunkingStrategy {
  readonly name = "messy-tabular";

  accepts(document: RawDocument): boolean {
    return document.messy && document.tables.some((t) => t.rows.length > 0);
  }

  chunk(document: RawDocument, analysis: Analysis | undefined, options: ChunkingOptions): Chunk[] {
    if (!analysis || isBlankAnalysis(analysis)) {
      throw new MissingAnalysisError("Messy tabular input requires a non-empty analysis", {
        documentId: document.id,
        operation: "chunk",
      });
    }

    const chunks: Chunk[] = [buildAnalysisChunk(document, analysis, 0)];
    const interpretation = excerpt(analysis.interpretation, options.interpretationExcerptChars);

    for (const table of document.tables) {
      const total = table.rows.length;
      const context = analysisExcerpt(analysis, table, options.analysisExcerptChars);

      for (let start = 0; start < total; start += options.rowBatchSize) {
        const end = Math.min(start + options.rowBatchSize, total);
        const order = chunks.length;
        const text = [
          `=== ANALYSIS CONTEXT ===\n${context}`,
          `=== DATA: ${table.name} rows ${start + 1}-${end} of ${total} ===\n${renderRows(table, start, end)}`,
          `=== INTERPRETATION ===\n${interpretation}`,
        ].join("\n\n");

        chunks.push({
          id: chunkId(document.id, order),
          sourceDocumentId: document.id,
          kind: "data",
          text,
          order,
          attributes: {
            source: sourceName(document),
            table: table.name,
            rowStart: start + 1,
            rowEnd: end,
            rowCount: total,
          },
        });
      }
    }
    return chunks;
  }
}
