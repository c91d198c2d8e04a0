import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { hashFile, loadManifest, saveManifest, scanFiles, type ScanOptions } from "../rag/file-scanner.js";
import type { Manifest } from "../rag/types.js";
import { makeTempDir, removeDir } from "./fakes.js";

describe("scanFiles", () => {
  let root: string;
  let options: ScanOptions;

  beforeEach(async () => {
    root = await makeTempDir();
    options = {
      dataDir: path.join(root, "data"),
      manifestPath: path.join(root, "cache", "manifest.json"),
      embeddingModel: "embed-a",
      chunkingSignature: "1000/200/25/600/300",
    };
    await mkdir(options.dataDir);
    await writeFile(path.join(options.dataDir, "b.csv"), "x,y\n1,2\n");
    await writeFile(path.join(options.dataDir, "a.txt"), "hello");
    await writeFile(path.join(options.dataDir, "photo.png"), "not text");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  async function recordAll(): Promise<Manifest> {
    const manifest: Manifest = {};
    for (const name of ["a.txt", "b.csv"]) {
      const file = path.join(options.dataDir, name);
      const fileStat = await stat(file);
      manifest[file] = {
        hash: await hashFile(file),
        documentId: name,
        chunkCount: 1,
        embeddingModel: options.embeddingModel,
        chunkingSignature: options.chunkingSignature,
        messy: false,
        mtime: fileStat.mtimeMs,
        size: fileStat.size,
      };
    }
    await saveManifest(options.manifestPath, manifest);
    return manifest;
  }

  it("reports every supported file as new without a manifest", async () => {
    const { result, manifest } = await scanFiles(options);
    expect(result).toEqual({
      newOrChanged: [path.join(options.dataDir, "a.txt"), path.join(options.dataDir, "b.csv")],
      unchanged: [],
      deleted: [],
    });
    expect(manifest).toEqual({});
  });

  it("skips files recorded with the same settings", async () => {
    await recordAll();
    const { result } = await scanFiles(options);
    expect(result.unchanged).toHaveLength(2);
    expect(result.newOrChanged).toEqual([]);
  });

  it("rescans everything when the embedding model changes", async () => {
    await recordAll();
    const { result } = await scanFiles({ ...options, embeddingModel: "embed-b" });
    expect(result.newOrChanged).toHaveLength(2);
  });

  it("notices edited and deleted files", async () => {
    await recordAll();
    await writeFile(path.join(options.dataDir, "a.txt"), "hello again");
    await rm(path.join(options.dataDir, "b.csv"));

    const { result } = await scanFiles(options);
    expect(result.newOrChanged).toEqual([path.join(options.dataDir, "a.txt")]);
    expect(result.deleted).toEqual([path.join(options.dataDir, "b.csv")]);
  });

  it("treats a missing data directory as empty", async () => {
    await recordAll();
    await rm(options.dataDir, { recursive: true });
    const { result } = await scanFiles(options);
    expect(result.newOrChanged).toEqual([]);
    expect(result.deleted).toHaveLength(2);
  });
});

describe("loadManifest", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("starts over from a corrupt manifest", async () => {
    const file = path.join(root, "manifest.json");
    await writeFile(file, "{ not json");
    const messages: string[] = [];
    expect(await loadManifest(file, (m) => messages.push(m))).toEqual({});
    expect(messages).toEqual([`RAG: manifest at ${file} is not valid JSON, rescanning everything`]);
  });
});
