import path from "node:path";
import { UnsupportedFormatError } from "../errors.js";
import type { RawDocument } from "../types.js";
import { extractCsv } from "./csv-extractor.js";
import { extractPdf } from "./pdf-extractor.js";
import { extractText } from "./text-extractor.js";
import { extractXlsx } from "./xlsx-extractor.js";

type Extractor = (filePath: string) => Promise<RawDocument>;

const extractors: Record<string, Extractor> = {
  ".pdf": extractPdf,
  ".txt": extractText,
  ".md": extractText,
  ".csv": extractCsv,
  ".tsv": extractCsv,
  ".xlsx": extractXlsx,
};

export const SUPPORTED_EXTENSIONS = Object.keys(extractors);

export function isSupportedFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() in extractors;
}

export async function extractFile(filePath: string): Promise<RawDocument> {
  const ext = path.extname(filePath).toLowerCase();
  const extractor = extractors[ext];
  if (!extractor) {
    throw new UnsupportedFormatError(`Unsupported file format: ${ext || "(none)"}`, {
      operation: "extract",
      path: filePath,
    });
  }
  return extractor(filePath);
}

export { documentIdFor } from "./document-id.js";
export { isMessyTable } from "./messy-detector.js";
