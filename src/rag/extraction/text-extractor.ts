import { readFile } from "node:fs/promises";
import path from "node:path";
import type { RawDocument } from "../types.js";
import { documentIdFor } from "./document-id.js";

export async function extractText(filePath: string): Promise<RawDocument> {
  const text = await readFile(filePath, "utf-8");
  const absolute = path.resolve(filePath);
  return {
    id: documentIdFor(absolute),
    sourcePath: absolute,
    contentKind: "text",
    rawText: text.replace(/\r\n/g, "\n"),
    tables: [],
    messy: false,
  };
}
