import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import type { RawDocument } from "../types.js";
import { documentIdFor } from "./document-id.js";

export async function extractPdf(filePath: string): Promise<RawDocument> {
  const buffer = await readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));

  const pages: string[] = [];
  for (let i = 1; i <= pdf.numPages; i++) {
    const page = await pdf.getPage(i);
    const textContent = await page.getTextContent();
    const text = textContent.items
      .map((item: { str?: string }) => item.str ?? "")
      .join(" ")
      .trim();
    if (text) pages.push(`--- Page ${i} ---\n${text}`);
  }

  const absolute = path.resolve(filePath);
  return {
    id: documentIdFor(absolute),
    sourcePath: absolute,
    contentKind: "text",
    rawText: pages.join("\n\n"),
    tables: [],
    messy: false,
  };
}
