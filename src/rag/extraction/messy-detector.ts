import type { Table } from "../types.js";

export interface MessyIndicators {
  unnamedColumns: boolean;
  sparseColumns: boolean;
  tooFewRows: boolean;
  tooManyColumns: boolean;
}

const UNNAMED = /^(unnamed(:\s*\d+)?|column\s*\d+|col\d+|field\d+|\d+)?$/i;

export function messyIndicators(table: Table): MessyIndicators {
  const width = table.columns.length;
  const unnamed = table.columns.filter((c) => UNNAMED.test(c.trim())).length;
  const sparse = table.columns.filter((_, col) => {
    const empty = table.rows.filter((row) => !(row[col] ?? "").trim()).length;
    return empty > table.rows.length * 0.5;
  }).length;

  return {
    unnamedColumns: unnamed > width * 0.3,
    sparseColumns: sparse > width * 0.3,
    tooFewRows: table.rows.length < 3,
    tooManyColumns: width > 50,
  };
}

/** Messy when at least two indicators fire. */
export function isMessyTable(table: Table): boolean {
  return Object.values(messyIndicators(table)).filter(Boolean).length >= 2;
}
