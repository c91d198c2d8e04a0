import path from "node:path";
import type { Analysis, Chunk, RawDocument, Table } from "../types.js";

export function chunkId(documentId: string, order: number): string {
  return `${documentId}:${order}`;
}

export function sourceName(document: RawDocument): string {
  return path.basename(document.sourcePath);
}

/**
 * Cuts text to at most `maxChars`, preferring the last word boundary.
 * The ellipsis counts toward the limit.
 */
export function excerpt(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) return trimmed;
  const room = Math.max(1, maxChars - 1);
  const cut = trimmed.lastIndexOf(" ", room);
  const end = cut > room / 2 ? cut : room;
  return trimmed.slice(0, end).trimEnd() + "…";
}

export function bulletList(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

export function fieldLines(fields: Record<string, string>): string[] {
  return Object.entries(fields).map(([name, meaning]) => `${name}: ${meaning}`);
}

export function tableRowCount(tables: readonly Table[]): number {
  return tables.reduce((sum, t) => sum + t.rows.length, 0);
}

/** Pipe-separated rendering of rows [start, end), header first. */
export function renderRows(table: Table, start: number, end: number): string {
  const lines: string[] = [];
  if (table.columns.length > 0) {
    lines.push(`Columns: ${table.columns.join(" | ")}`);
  }
  for (const row of table.rows.slice(start, end)) {
    lines.push(row.join(" | "));
  }
  return lines.join("\n");
}

export function renderTables(tables: readonly Table[]): string {
  return tables
    .filter((t) => t.rows.length > 0 || t.columns.length > 0)
    .map((t) => `=== ${t.name} ===\n${renderRows(t, 0, t.rows.length)}`)
    .join("\n\n");
}

export function isBlankAnalysis(analysis: Analysis): boolean {
  return !analysis.summary.trim() || !analysis.interpretation.trim();
}

/**
 * The single chunk that makes an Analysis retrievable. Carries the whole
 * narrative, interpretation and structured summary, never raw rows.
 */
export function buildAnalysisChunk(document: RawDocument, analysis: Analysis, order: number): Chunk {
  const { fields, patterns, suggestedQuestions } = analysis.structuredSummary;
  const sections = [
    `=== DATA STRUCTURE ANALYSIS: ${sourceName(document)} ===\n${analysis.summary.trim()}`,
    `=== INTERPRETATION & GUIDANCE ===\n${analysis.interpretation.trim()}`,
  ];

  const structured: string[] = [];
  const fieldList = fieldLines(fields);
  if (fieldList.length > 0) structured.push(`Field meanings:\n${bulletList(fieldList)}`);
  if (patterns.length > 0) structured.push(`Detected patterns:\n${bulletList(patterns)}`);
  if (suggestedQuestions.length > 0) {
    structured.push(`Suggested questions:\n${bulletList(suggestedQuestions)}`);
  }
  if (structured.length > 0) {
    sections.push(`=== STRUCTURED SUMMARY ===\n${structured.join("\n")}`);
  }

  return {
    id: chunkId(document.id, order),
    sourceDocumentId: document.id,
    kind: "analysis",
    text: sections.join("\n\n"),
    order,
    attributes: {
      source: sourceName(document),
      tables: document.tables.length,
      rows: tableRowCount(document.tables),
    },
  };
}
