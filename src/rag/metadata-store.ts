import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConsistencyError, DuplicateChunkError } from "./errors.js";
import type { Chunk, ChunkKind } from "./types.js";

export const METADATA_FORMAT_VERSION = 1;

const recordSchema = z.object({
  text: z.string(),
  kind: z.enum(["analysis", "data", "plain_text"]),
  sourceDocumentId: z.string().min(1),
  order: z.number().int().nonnegative(),
  attributes: z.record(z.union([z.string(), z.number(), z.boolean()])),
});

const fileSchema = z.object({
  version: z.literal(METADATA_FORMAT_VERSION),
  count: z.number().int().nonnegative(),
  chunks: z.record(recordSchema),
});

export type ChunkRecord = z.infer<typeof recordSchema>;

export function metadataPath(dir: string): string {
  return path.join(dir, "metadata.json");
}

/** Chunk id → everything about the chunk except its vector. */
export class MetadataStore {
  private readonly records = new Map<string, ChunkRecord>();

  count(): number {
    return this.records.size;
  }

  has(chunkId: string): boolean {
    return this.records.has(chunkId);
  }

  ids(): string[] {
    return [...this.records.keys()];
  }

  get(chunkId: string): Chunk | undefined {
    const record = this.records.get(chunkId);
    if (!record) return undefined;
    return { id: chunkId, ...record, attributes: { ...record.attributes } };
  }

  add(chunks: Chunk[]): void {
    const seen = new Set<string>();
    for (const chunk of chunks) {
      if (this.records.has(chunk.id) || seen.has(chunk.id)) {
        throw new DuplicateChunkError("Chunk id already stored", {
          chunkId: chunk.id,
          documentId: chunk.sourceDocumentId,
          operation: "metadata.add",
        });
      }
      seen.add(chunk.id);
    }
    for (const { id, ...record } of chunks) {
      this.records.set(id, { ...record, attributes: { ...record.attributes } });
    }
  }

  remove(chunkIds: Iterable<string>): number {
    let removed = 0;
    for (const id of chunkIds) {
      if (this.records.delete(id)) removed++;
    }
    return removed;
  }

  idsForDocument(documentId: string): string[] {
    return [...this.records]
      .filter(([, record]) => record.sourceDocumentId === documentId)
      .map(([id]) => id);
  }

  documentIds(): string[] {
    return [...new Set([...this.records.values()].map((r) => r.sourceDocumentId))];
  }

  countByKind(): Record<ChunkKind, number> {
    const counts: Record<ChunkKind, number> = { analysis: 0, data: 0, plain_text: 0 };
    for (const record of this.records.values()) counts[record.kind]++;
    return counts;
  }

  clear(): void {
    this.records.clear();
  }

  async save(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
    const chunks = Object.fromEntries([...this.records].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    await writeFile(
      metadataPath(dir),
      JSON.stringify({ version: METADATA_FORMAT_VERSION, count: this.records.size, chunks }, null, 2),
    );
  }

  /** Returns null when nothing was ever saved under `dir`. */
  static async load(dir: string): Promise<MetadataStore | null> {
    let raw: string;
    try {
      raw = await readFile(metadataPath(dir), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConsistencyError(
        "Metadata file is not valid JSON",
        { operation: "metadata.load", path: metadataPath(dir) },
        { cause: err },
      );
    }
    const parsed = fileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConsistencyError(`Unreadable metadata file: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
        operation: "metadata.load",
        path: metadataPath(dir),
      });
    }

    const entries = Object.entries(parsed.data.chunks);
    if (entries.length !== parsed.data.count) {
      throw new ConsistencyError(
        `Metadata file holds ${entries.length} chunks, header says ${parsed.data.count}`,
        { operation: "metadata.load" },
      );
    }

    const store = new MetadataStore();
    for (const [id, record] of entries) store.records.set(id, record);
    return store;
  }
}
