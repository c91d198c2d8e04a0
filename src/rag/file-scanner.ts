import { readFile, writeFile, mkdir, stat, readdir } from "node:fs/promises";
import { createHash } from "node:crypto";
import path from "node:path";
import { z } from "zod";
import { isSupportedFile } from "./extraction/index.js";
import type { LogFn, Manifest, ManifestEntry } from "./types.js";

export interface ScanResult {
  newOrChanged: string[];
  unchanged: string[];
  deleted: string[];
}

export interface ScanOptions {
  dataDir: string;
  manifestPath: string;
  embeddingModel: string;
  chunkingSignature: string;
  log?: LogFn;
}

const manifestSchema = z.record(
  z.object({
    hash: z.string(),
    documentId: z.string(),
    chunkCount: z.number().int().nonnegative(),
    embeddingModel: z.string(),
    chunkingSignature: z.string(),
    messy: z.boolean(),
    mtime: z.number(),
    size: z.number(),
  }),
);

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export async function hashFile(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return createHash("sha256").update(buffer).digest("hex");
}

/** A missing or unreadable manifest means every file is treated as new. */
export async function loadManifest(manifestPath: string, log: LogFn = () => {}): Promise<Manifest> {
  let data: string;
  try {
    data = await readFile(manifestPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return {};
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    log(`RAG: manifest at ${manifestPath} is not valid JSON, rescanning everything`);
    return {};
  }
  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    log(`RAG: manifest at ${manifestPath} has an unexpected shape, rescanning everything`);
    return {};
  }
  return parsed.data;
}

export async function saveManifest(manifestPath: string, manifest: Manifest): Promise<void> {
  await mkdir(path.dirname(manifestPath), { recursive: true });
  await writeFile(manifestPath, JSON.stringify(manifest, null, 2));
}

function matchesSettings(entry: ManifestEntry, options: ScanOptions): boolean {
  return entry.embeddingModel === options.embeddingModel && entry.chunkingSignature === options.chunkingSignature;
}

export async function scanFiles(options: ScanOptions): Promise<{ result: ScanResult; manifest: Manifest }> {
  const manifest = await loadManifest(options.manifestPath, options.log);
  const result: ScanResult = { newOrChanged: [], unchanged: [], deleted: [] };

  let files: string[];
  try {
    const entries = await readdir(options.dataDir);
    files = entries
      .filter(isSupportedFile)
      .sort()
      .map((f) => path.join(options.dataDir, f));
  } catch (err) {
    // no data dir yet: nothing to ingest, but manifest entries still count as deleted
    if (!isNotFound(err)) throw err;
    files = [];
  }

  // Files ingested by hand from elsewhere stay tracked while they exist.
  for (const filePath of Object.keys(manifest)) {
    if (path.dirname(filePath) !== options.dataDir && (await exists(filePath))) {
      files.push(filePath);
    }
  }

  const currentFilePaths = new Set(files);
  for (const filePath of Object.keys(manifest)) {
    if (!currentFilePaths.has(filePath)) {
      result.deleted.push(filePath);
    }
  }

  for (const filePath of files) {
    const entry = manifest[filePath];
    const fileStat = await stat(filePath);

    // Fast path: mtime+size match and same model/chunking settings
    if (entry && entry.mtime === fileStat.mtimeMs && entry.size === fileStat.size && matchesSettings(entry, options)) {
      result.unchanged.push(filePath);
      continue;
    }

    // Slow path: hash check
    const hash = await hashFile(filePath);
    if (entry && entry.hash === hash && matchesSettings(entry, options)) {
      entry.mtime = fileStat.mtimeMs;
      entry.size = fileStat.size;
      result.unchanged.push(filePath);
      continue;
    }

    result.newOrChanged.push(filePath);
  }

  return { result, manifest };
}
