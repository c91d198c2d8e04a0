import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CollectionUnavailableError, ConsistencyError, IngestionError, errorMessage } from "./errors.js";
import { ReadWriteLock } from "./lock.js";
import { MetadataStore } from "./metadata-store.js";
import type { Chunk, ChunkKind, LogFn } from "./types.js";
import { VectorIndex } from "./vector-store.js";

export interface CollectionOptions {
  /** Where the index and metadata are persisted. Memory-only when omitted. */
  dir?: string;
  log?: LogFn;
}

export interface CollectionStats {
  vectors: number;
  chunks: number;
  documents: number;
  dimension: number | null;
  byKind: Record<ChunkKind, number>;
  halted: boolean;
}

export interface CollectionHit {
  chunk: Chunk;
  distance: number;
}

interface SavedChunk {
  chunk: Chunk;
  vector: number[];
}

const pointerSchema = z.object({
  version: z.literal(1),
  generation: z.number().int().positive(),
});

const GENERATION_DIR = /^gen-(\d+)$/;

function pointerPath(dir: string): string {
  return path.join(dir, "collection.json");
}

export function generationDir(dir: string, generation: number): string {
  return path.join(dir, `gen-${generation}`);
}

async function readGeneration(dir: string): Promise<number | null> {
  let raw: string;
  try {
    raw = await readFile(pointerPath(dir), "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConsistencyError(
      "Collection pointer is not valid JSON",
      { operation: "collection.open", path: pointerPath(dir) },
      { cause: err },
    );
  }
  const parsed = pointerSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConsistencyError(`Unreadable collection pointer: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
      operation: "collection.open",
      path: pointerPath(dir),
    });
  }
  return parsed.data.generation;
}

/** The snapshot directory a reopen would load, or null when nothing was flushed. */
export async function activeGenerationDir(dir: string): Promise<string | null> {
  const generation = await readGeneration(dir);
  return generation === null ? null : generationDir(dir, generation);
}

function sameIds(index: VectorIndex, metadata: MetadataStore): string | null {
  if (index.size() !== metadata.count()) {
    return `index holds ${index.size()} vectors but metadata holds ${metadata.count()} chunks`;
  }
  for (const id of metadata.ids()) {
    if (!index.has(id)) return `chunk ${id} has metadata but no vector`;
  }
  return null;
}

/**
 * The active Vector Index + Metadata Store pair. Every mutation goes through
 * here under the write lock, keeps both stores in lockstep and is flushed to
 * disk before the lock is released.
 *
 * Each flush writes a complete snapshot to a fresh `gen-N` directory and then
 * renames `collection.json` to point at it, so a crash mid-flush leaves the
 * previous snapshot active. A flush that fails undoes the mutation in memory.
 */
export class Collection {
  private readonly lock = new ReadWriteLock();
  private closed = false;
  private haltReason: string | null = null;

  private constructor(
    readonly dir: string | undefined,
    private index: VectorIndex,
    private metadata: MetadataStore,
    private generation: number,
    private readonly log: LogFn,
  ) {}

  /** Loads the persisted pair from `dir`, or starts empty when there is none. */
  static async open(options: CollectionOptions = {}): Promise<Collection> {
    const log = options.log ?? (() => {});
    const { dir } = options;
    if (!dir) return new Collection(undefined, new VectorIndex(), new MetadataStore(), 0, log);

    const generation = await readGeneration(dir);
    if (generation === null) {
      log(`RAG: no collection at ${dir}, starting empty`);
      return new Collection(dir, new VectorIndex(), new MetadataStore(), 0, log);
    }

    const snapshot = generationDir(dir, generation);
    const [index, metadata] = await Promise.all([VectorIndex.load(snapshot), MetadataStore.load(snapshot)]);
    if (!index || !metadata) {
      throw new ConsistencyError(
        `Persisted collection is incomplete: ${index ? "metadata" : metadata ? "index" : "index and metadata"} missing`,
        { operation: "collection.open", path: snapshot },
      );
    }
    const mismatch = sameIds(index, metadata);
    if (mismatch) {
      throw new ConsistencyError(`Persisted collection rejected: ${mismatch}`, {
        operation: "collection.open",
        path: snapshot,
      });
    }

    log(`RAG: loaded collection (${index.size()} chunks, ${metadata.documentIds().length} documents)`);
    return new Collection(dir, index, metadata, generation, log);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isHalted(): boolean {
    return this.haltReason !== null;
  }

  hasDocument(documentId: string): boolean {
    return this.metadata.idsForDocument(documentId).length > 0;
  }

  documentIds(): string[] {
    return this.metadata.documentIds();
  }

  stats(): CollectionStats {
    return {
      vectors: this.index.size(),
      chunks: this.metadata.count(),
      documents: this.metadata.documentIds().length,
      dimension: this.index.dimension,
      byKind: this.metadata.countByKind(),
      halted: this.isHalted,
    };
  }

  /**
   * Inserts one document's chunks and their vectors as a unit. Readers never
   * observe a vector without metadata or the reverse.
   */
  async add(chunks: Chunk[], vectors: number[][]): Promise<void> {
    await this.lock.write(async () => {
      this.ensureUsable("collection.add");
      const documentId = chunks[0]?.sourceDocumentId;
      if (documentId !== undefined && this.hasDocument(documentId)) {
        throw new IngestionError("Document already in collection; remove it first", {
          documentId,
          operation: "collection.add",
        });
      }

      const previousDimension = this.index.dimension;
      const ids = chunks.map((c) => c.id);
      this.attach(chunks, vectors);
      this.assertConsistent("collection.add");
      await this.commit(() => {
        this.detach(ids);
        if (previousDimension === null) this.index.clear();
      });
    });
  }

  /** Removes every chunk of a document from both stores. */
  async removeBySourceDocument(documentId: string): Promise<number> {
    return this.lock.write(async () => {
      this.ensureUsable("collection.remove");
      const ids = this.metadata.idsForDocument(documentId);
      if (ids.length === 0) return 0;

      const saved = this.take(ids);
      const removed = this.detach(ids, documentId);
      this.assertConsistent("collection.remove");
      await this.commit(() => this.restore(saved));
      return removed;
    });
  }

  /**
   * Swaps a document's chunks for a new set in one write. On any failure the
   * old chunks stay in place. Returns how many old chunks were dropped.
   */
  async replace(documentId: string, chunks: Chunk[], vectors: number[][]): Promise<number> {
    return this.lock.write(async () => {
      this.ensureUsable("collection.replace");
      const stranger = chunks.find((c) => c.sourceDocumentId !== documentId);
      if (stranger) {
        throw new IngestionError(`Chunk ${stranger.id} belongs to ${stranger.sourceDocumentId}`, {
          documentId,
          operation: "collection.replace",
        });
      }

      const oldIds = this.metadata.idsForDocument(documentId);
      const saved = this.take(oldIds);
      const removed = this.detach(oldIds, documentId);
      try {
        this.attach(chunks, vectors);
      } catch (err) {
        this.restore(saved);
        throw err;
      }
      this.assertConsistent("collection.replace");

      const newIds = chunks.map((c) => c.id);
      await this.commit(() => {
        this.detach(newIds);
        this.restore(saved);
      });
      return removed;
    });
  }

  /** Nearest chunks to `vector`, ascending distance. */
  async search(vector: number[], k: number): Promise<CollectionHit[]> {
    return this.lock.read(() => {
      this.ensureUsable("collection.search");
      return this.index.search(vector, k).map(({ chunkId, distance }) => {
        const chunk = this.metadata.get(chunkId);
        if (!chunk) {
          return this.halt(`vector ${chunkId} has no metadata`, "collection.search");
        }
        return { chunk, distance };
      });
    });
  }

  /** Writes the current state to disk. A no-op for a memory-only collection. */
  async flush(): Promise<void> {
    await this.lock.write(async () => {
      this.ensureUsable("collection.flush");
      await this.persist();
    });
  }

  /** Drops everything, clearing a halt. The caller re-ingests from raw documents. */
  async reset(): Promise<void> {
    await this.lock.write(async () => {
      if (this.closed) throw new CollectionUnavailableError("Collection is closed", { operation: "collection.reset" });
      const previous = { index: this.index, metadata: this.metadata, haltReason: this.haltReason };
      this.index = new VectorIndex();
      this.metadata = new MetadataStore();
      this.haltReason = null;
      await this.commit(() => {
        this.index = previous.index;
        this.metadata = previous.metadata;
        this.haltReason = previous.haltReason;
      });
      this.log("RAG: collection reset");
    });
  }

  /** Flushes and refuses any further use. Safe to call twice. */
  async close(): Promise<void> {
    await this.lock.write(async () => {
      if (this.closed) return;
      if (!this.haltReason) await this.persist();
      this.closed = true;
    });
  }

  private ensureUsable(operation: string): void {
    if (this.closed) {
      throw new CollectionUnavailableError("Collection is closed", { operation });
    }
    if (this.haltReason) {
      throw new ConsistencyError(`Collection halted until rebuilt: ${this.haltReason}`, { operation });
    }
  }

  private assertConsistent(operation: string): void {
    const mismatch = sameIds(this.index, this.metadata);
    if (mismatch) this.halt(mismatch, operation);
  }

  private halt(reason: string, operation: string, documentId?: string): never {
    this.haltReason = reason;
    this.log(`RAG: consistency violation during ${operation}: ${reason}`);
    throw new ConsistencyError(reason, { operation, documentId });
  }

  /** Vectors go in first; metadata that fails to insert takes them back out. */
  private attach(chunks: Chunk[], vectors: number[][]): void {
    const ids = chunks.map((c) => c.id);
    this.index.add(vectors, ids);
    try {
      this.metadata.add(chunks);
    } catch (err) {
      this.index.remove(ids);
      throw err;
    }
  }

  private detach(ids: string[], documentId?: string): number {
    const fromIndex = this.index.remove(ids);
    const fromMetadata = this.metadata.remove(ids);
    if (fromIndex !== fromMetadata) {
      this.halt(`removed ${fromIndex} vectors but ${fromMetadata} chunks`, "collection.remove", documentId);
    }
    return fromMetadata;
  }

  private take(ids: string[]): SavedChunk[] {
    return ids.flatMap((id) => {
      const chunk = this.metadata.get(id);
      const vector = this.index.vector(id);
      return chunk && vector ? [{ chunk, vector }] : [];
    });
  }

  private restore(saved: SavedChunk[]): void {
    this.attach(
      saved.map((s) => s.chunk),
      saved.map((s) => s.vector),
    );
  }

  private async commit(undo: () => void): Promise<void> {
    try {
      await this.persist();
    } catch (err) {
      undo();
      throw err;
    }
  }

  private async persist(): Promise<void> {
    if (!this.dir || this.haltReason) return;
    const next = this.generation + 1;
    const snapshot = generationDir(this.dir, next);
    await rm(snapshot, { recursive: true, force: true });
    await this.index.save(snapshot);
    await this.metadata.save(snapshot);

    await mkdir(this.dir, { recursive: true });
    const staging = `${pointerPath(this.dir)}.tmp`;
    await writeFile(staging, JSON.stringify({ version: 1, generation: next }));
    await rename(staging, pointerPath(this.dir));
    this.generation = next;

    await this.dropStaleGenerations();
    this.log(`RAG: flushed collection (${this.index.size()} chunks)`);
  }

  /** Deletes every snapshot but the active one; a failed delete is logged, not thrown. */
  private async dropStaleGenerations(): Promise<void> {
    if (!this.dir) return;
    for (const name of await readdir(this.dir)) {
      const match = GENERATION_DIR.exec(name);
      if (!match || Number(match[1]) === this.generation) continue;
      try {
        await rm(path.join(this.dir, name), { recursive: true, force: true });
      } catch (err) {
        this.log(`RAG: could not remove old snapshot ${name}: ${errorMessage(err)}`);
      }
    }
  }
}
