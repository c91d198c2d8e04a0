import path from "node:path";
import ExcelJS from "exceljs";
import type { RawDocument, Table } from "../types.js";
import { toTable } from "./csv-extractor.js";
import { documentIdFor } from "./document-id.js";
import { isMessyTable } from "./messy-detector.js";

/** Cell text as Excel would display it, one array per non-blank row. */
function sheetRows(sheet: ExcelJS.Worksheet): string[][] {
  const rows: string[][] = [];
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= sheet.columnCount; c++) {
      cells.push(row.getCell(c).text);
    }
    if (cells.some((cell) => cell.trim() !== "")) rows.push(cells);
  }
  return rows;
}

function describeSheet(table: Table): string {
  return [
    `=== Sheet: ${table.name} ===`,
    `Rows: ${table.rows.length}, Columns: ${table.columns.length}`,
    `Columns: ${table.columns.join(", ")}`,
    ...table.rows.map((r) => r.join(" | ")),
  ].join("\n");
}

/** One table per worksheet, in workbook order. Messiness is judged on the first sheet. */
export async function extractXlsx(filePath: string): Promise<RawDocument> {
  const absolute = path.resolve(filePath);
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(absolute);

  const tables = workbook.worksheets
    .map((sheet) => toTable(sheet.name, sheetRows(sheet)))
    .filter((table) => table.columns.length > 0);
  const [first] = tables;

  return {
    id: documentIdFor(absolute),
    sourcePath: absolute,
    contentKind: "table",
    rawText: tables.map(describeSheet).join("\n\n"),
    tables,
    messy: first ? isMessyTable(first) : false,
  };
}
