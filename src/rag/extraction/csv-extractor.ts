import { readFile } from "node:fs/promises";
import path from "node:path";
import type { RawDocument, Table } from "../types.js";
import { documentIdFor } from "./document-id.js";
import { isMessyTable } from "./messy-detector.js";

const DELIMITERS = [",", ";", "\t", "|"];

/** RFC 4180-style parse: quoted fields, doubled quotes, CRLF or LF. */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
    } else if (ch === '"' && field === "") {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => r.some((cell) => cell.trim() !== ""));
}

/**
 * Picks the delimiter that yields more than one column on the most lines,
 * preferring the earlier candidate on ties.
 */
export function sniffDelimiter(text: string): string {
  const sample = text.split(/\r?\n/).slice(0, 20).filter((l) => l.trim() !== "");
  let best = DELIMITERS[0] ?? ",";
  let bestScore = 0;
  for (const delimiter of DELIMITERS) {
    const counts = sample.map((line) => parseDelimited(line, delimiter)[0]?.length ?? 0);
    const first = counts[0] ?? 0;
    const consistent = counts.filter((c) => c === first && c > 1).length;
    if (consistent > bestScore) {
      best = delimiter;
      bestScore = consistent;
    }
  }
  return best;
}

/** First row becomes the header; short rows are padded so every row has one cell per column. */
export function toTable(name: string, rows: string[][]): Table {
  const [header = [], ...body] = rows;
  const width = Math.max(header.length, ...body.map((r) => r.length));
  const columns = Array.from({ length: width }, (_, i) => (header[i] ?? "").trim());
  return {
    name,
    columns,
    rows: body.map((r) => Array.from({ length: width }, (_, i) => (r[i] ?? "").trim())),
  };
}

export async function extractCsv(filePath: string): Promise<RawDocument> {
  const text = await readFile(filePath, "utf-8");
  const delimiter = path.extname(filePath).toLowerCase() === ".tsv" ? "\t" : sniffDelimiter(text);
  const absolute = path.resolve(filePath);
  const table = toTable(path.basename(filePath), parseDelimited(text, delimiter));

  const rawText = [
    `Table with ${table.rows.length} rows and ${table.columns.length} columns`,
    `Columns: ${table.columns.join(", ")}`,
    ...table.rows.map((r) => r.join(" | ")),
  ].join("\n");

  return {
    id: documentIdFor(absolute),
    sourcePath: absolute,
    contentKind: "table",
    rawText: table.rows.length > 0 || table.columns.length > 0 ? rawText : "",
    tables: [table],
    messy: isMessyTable(table),
  };
}
