import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Collection } from "../rag/collection.js";
import { loadRagConfig, type RagConfig } from "../rag/config.js";
import { ConsistencyError, IngestionError } from "../rag/errors.js";
import { documentIdFor } from "../rag/extraction/index.js";
import { initRagPipeline, type RagPipeline } from "../rag/pipeline.js";
import { VectorIndex } from "../rag/vector-store.js";
import { FakeEmbeddingGateway, FakeLlmGateway, makeTempDir, removeDir } from "./fakes.js";

const STRUCTURED = '{"fields": {"amt": "amount"}, "patterns": [], "suggestedQuestions": []}';

function fakeLlm(): FakeLlmGateway {
  return new FakeLlmGateway((prompt) => {
    if (prompt.includes("return a JSON object")) return STRUCTURED;
    if (prompt.includes("Data:\n") || prompt.includes("Analysis:\n")) return "Ledger of amounts.";
    return "Answer";
  });
}

async function collect(tokens: AsyncIterable<string>): Promise<string> {
  let text = "";
  for await (const token of tokens) text += token;
  return text;
}

describe("initRagPipeline", () => {
  let root: string;
  let config: RagConfig;
  let pipeline: RagPipeline | undefined;
  const messages: string[] = [];
  const log = (msg: string) => {
    messages.push(msg);
  };

  beforeEach(async () => {
    root = await makeTempDir();
    const dataDir = path.join(root, "data");
    await mkdir(dataDir);
    await writeFile(path.join(dataDir, "notes.txt"), "Quarterly planning notes.");
    await writeFile(path.join(dataDir, "ledger.csv"), ",Unnamed: 1,amt\nx,1,10\ny,2,20\n");
    config = loadRagConfig({
      RAG_DATA_DIR: dataDir,
      RAG_CACHE_DIR: path.join(root, "cache"),
      RAG_CHUNK_SIZE: "200",
      RAG_CHUNK_OVERLAP: "20",
      RAG_HYBRID: "false",
    });
    messages.length = 0;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await pipeline?.close();
    pipeline = undefined;
    await removeDir(root);
  });

  it("ingests every file in the data directory", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);

    expect(pipeline.stats()).toMatchObject({
      files: 2,
      documents: 2,
      chunks: 3,
      byKind: { analysis: 1, data: 1, plain_text: 1 },
    });
    expect(messages).toContain("RAG: ledger.csv looks messy, analyzing its structure...");
    expect(messages.at(-1)).toBe("RAG ready: 2 document(s), 3 chunks");
  });

  it("reuses the persisted collection for unchanged files", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    await pipeline.close();

    const embeddings = new FakeEmbeddingGateway();
    pipeline = await initRagPipeline({ embeddings, llm: fakeLlm() }, log, config);

    expect(embeddings.calls).toEqual([]);
    expect(pipeline.stats().chunks).toBe(3);
    expect(messages).toContain("RAG: 2 file(s) cached, skipping");
  });

  it("drops the chunks of files deleted between runs", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    await pipeline.close();
    await rm(path.join(config.dataDir, "notes.txt"));

    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    expect(pipeline.stats()).toMatchObject({ files: 1, documents: 1, chunks: 2 });
  });

  it("rebuilds the collection when the embedding model changes", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    await pipeline.close();

    const embeddings = new FakeEmbeddingGateway(() => [0, 1], "other-embedding");
    pipeline = await initRagPipeline({ embeddings, llm: fakeLlm() }, log, config);

    expect(messages).toContain("RAG: embedding model changed to other-embedding, rebuilding the collection");
    expect(embeddings.calls.length).toBeGreaterThan(0);
    expect(pipeline.stats()).toMatchObject({ documents: 2, chunks: 3 });
  });

  it("answers with retrieved context in the system prompt", async () => {
    const llm = fakeLlm();
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm }, log, config);

    const queried = await pipeline.query("What is in the ledger?");
    expect(queried.results).toHaveLength(3);
    expect(queried.contextSuffix?.startsWith("\n\n--- Retrieved Context ---")).toBe(true);

    const answer = await pipeline.answer("What is in the ledger?");
    expect(await collect(answer.tokens)).toBe("Answer");
    expect(answer.sourcesLine).toBe(queried.sourcesLine);
    expect(llm.prompts.at(-1)).toBe("What is in the ledger?");
  });

  it("removes a document by its file path", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);

    expect(await pipeline.removeDocument(path.join(config.dataDir, "ledger.csv"))).toBe(2);
    expect(pipeline.stats()).toMatchObject({ files: 1, documents: 1, chunks: 1 });
  });

  it("returns no context when nothing is indexed", async () => {
    await rm(config.dataDir, { recursive: true });
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);

    const queried = await pipeline.query("anything?");
    expect(queried).toEqual({ results: [], contextSuffix: null, sourcesLine: null });
  });

  it("keeps the indexed version of a file whose update fails to embed", async () => {
    const embeddings = new FakeEmbeddingGateway();
    pipeline = await initRagPipeline({ embeddings, llm: fakeLlm() }, log, config);
    const notes = path.join(config.dataDir, "notes.txt");
    await writeFile(notes, "Revised planning notes.");

    embeddings.failNext(new Error("connection reset"));
    await expect(pipeline.ingestFile(notes)).rejects.toBeInstanceOf(IngestionError);
    expect(pipeline.stats()).toMatchObject({ files: 2, documents: 2, chunks: 3 });

    await pipeline.close();
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    expect(pipeline.stats()).toMatchObject({ files: 2, documents: 2, chunks: 3 });
  });

  it("re-ingests everything when the stored collection cannot be read", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    await pipeline.close();
    await writeFile(path.join(config.collectionDir, "collection.json"), "{not json");
    messages.length = 0;

    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    expect(messages[0]?.startsWith("RAG: stored collection is unusable (Collection pointer is not valid JSON")).toBe(
      true,
    );
    expect(messages[0]?.endsWith("), rebuilding from source files")).toBe(true);
    expect(pipeline.stats()).toMatchObject({ files: 2, documents: 2, chunks: 3, halted: false });
  });

  it("re-ingests a cached file whose chunks went missing from the collection", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    await pipeline.close();
    const stored = await Collection.open({ dir: config.collectionDir });
    await stored.removeBySourceDocument(documentIdFor(path.join(config.dataDir, "notes.txt")));
    await stored.close();

    const embeddings = new FakeEmbeddingGateway();
    pipeline = await initRagPipeline({ embeddings, llm: fakeLlm() }, log, config);
    expect(embeddings.calls).toHaveLength(1);
    expect(messages).toContain("RAG: 1 file(s) cached, skipping");
    expect(pipeline.stats()).toMatchObject({ files: 2, documents: 2, chunks: 3 });
  });

  it("recovers a halted collection with rebuild", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);
    vi.spyOn(VectorIndex.prototype, "remove").mockReturnValueOnce(0);

    await expect(pipeline.removeDocument(path.join(config.dataDir, "ledger.csv"))).rejects.toBeInstanceOf(
      ConsistencyError,
    );
    expect(pipeline.stats().halted).toBe(true);
    await expect(pipeline.query("What is in the ledger?")).rejects.toBeInstanceOf(ConsistencyError);

    const rebuilt = await pipeline.rebuild();
    expect(rebuilt).toMatchObject({ files: 2, documents: 2, chunks: 3, halted: false });
    expect((await pipeline.query("What is in the ledger?")).results).toHaveLength(3);
  });

  it("removes a document by its id and stops tracking its file", async () => {
    pipeline = await initRagPipeline({ embeddings: new FakeEmbeddingGateway(), llm: fakeLlm() }, log, config);

    expect(await pipeline.removeDocument(documentIdFor(path.join(config.dataDir, "ledger.csv")))).toBe(2);
    expect(pipeline.stats()).toMatchObject({ files: 1, documents: 1, chunks: 1 });
  });
});
