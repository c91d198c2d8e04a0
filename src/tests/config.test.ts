import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadRagConfig } from "../rag/config.js";

describe("loadRagConfig", () => {
  it("uses the defaults when nothing is set", () => {
    const config = loadRagConfig({});
    expect(config.topK).toBe(5);
    expect(config.similarityThreshold).toBe(0);
    expect(config.hybrid).toBe(true);
    expect(config.rerank).toBe(false);
    expect(config.collectionDir).toBe(path.resolve(".rag-cache", "collection"));
    expect(config.manifestPath).toBe(path.resolve(".rag-cache", "manifest.json"));
  });

  it("reads typed overrides from the environment", () => {
    const config = loadRagConfig({
      RAG_TOP_K: "8",
      RAG_SIMILARITY_THRESHOLD: "0.35",
      RAG_HYBRID: "0",
      RAG_RERANK: "true",
      RAG_CACHE_DIR: "/tmp/rag-test-cache",
    });
    expect(config.topK).toBe(8);
    expect(config.similarityThreshold).toBe(0.35);
    expect(config.hybrid).toBe(false);
    expect(config.rerank).toBe(true);
    expect(config.collectionDir).toBe(path.join("/tmp/rag-test-cache", "collection"));
  });

  it("names the variable that is invalid", () => {
    expect(() => loadRagConfig({ RAG_TOP_K: "many" })).toThrow(/^Invalid RAG_TOP_K: /);
    expect(() => loadRagConfig({ RAG_HYBRID: "yes" })).toThrow(/^Invalid RAG_HYBRID: /);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadRagConfig({ RAG_CHUNK_SIZE: "200", RAG_CHUNK_OVERLAP: "200" })).toThrow(
      "Invalid RAG_CHUNK_OVERLAP: 200 must be smaller than chunk size 200",
    );
  });
});
