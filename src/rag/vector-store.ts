import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { ItemSelector, LocalIndex } from "vectra";
import { z } from "zod";
import { ConsistencyError, DimensionMismatchError, DuplicateChunkError } from "./errors.js";
import type { IndexEntry, SearchHit } from "./types.js";

export const INDEX_FORMAT_VERSION = 1;

const headerSchema = z.object({
  version: z.literal(INDEX_FORMAT_VERSION),
  dimension: z.number().int().positive().nullable(),
  count: z.number().int().nonnegative(),
});

type IndexHeader = z.infer<typeof headerSchema>;

interface StoredVector {
  vector: number[];
  norm: number;
}

export function vectraPath(dir: string): string {
  return path.join(dir, "index");
}

export function headerPath(dir: string): string {
  return path.join(dir, "index.meta.json");
}

/**
 * Exact cosine nearest-neighbour index over chunk vectors, scored with the
 * same `ItemSelector` math vectra's `LocalIndex.queryItems` uses.
 *
 * Distances are `1 - cosine`, so results come back in ascending distance
 * order; equal distances are ordered by chunk id. The dimension is fixed by
 * the first insertion and kept until `clear()`.
 */
export class VectorIndex {
  private entries = new Map<string, StoredVector>();
  private dim: number | null;

  constructor(dimension: number | null = null) {
    this.dim = dimension;
  }

  get dimension(): number | null {
    return this.dim;
  }

  size(): number {
    return this.entries.size;
  }

  has(chunkId: string): boolean {
    return this.entries.has(chunkId);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  /** Validates the whole batch before touching the index. */
  add(vectors: number[][], chunkIds: string[]): void {
    if (vectors.length !== chunkIds.length) {
      throw new RangeError(
        `add() got ${vectors.length} vectors for ${chunkIds.length} chunk ids`,
      );
    }
    const dimension = this.dim ?? vectors[0]?.length ?? null;
    const seen = new Set<string>();
    vectors.forEach((vector, i) => {
      const chunkId = chunkIds[i] ?? "";
      if (dimension !== null && vector.length !== dimension) {
        throw new DimensionMismatchError(dimension, vector.length, { chunkId, operation: "index.add" });
      }
      if (this.entries.has(chunkId) || seen.has(chunkId)) {
        throw new DuplicateChunkError("Chunk id already indexed", { chunkId, operation: "index.add" });
      }
      seen.add(chunkId);
    });

    if (vectors.length === 0) return;
    this.dim = dimension;
    vectors.forEach((vector, i) => {
      this.entries.set(chunkIds[i] ?? "", { vector: [...vector], norm: ItemSelector.normalize(vector) });
    });
  }

  search(queryVector: number[], k: number): SearchHit[] {
    if (this.entries.size === 0 || k <= 0) return [];
    if (this.dim !== null && queryVector.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, queryVector.length, { operation: "index.search" });
    }

    const queryNorm = ItemSelector.normalize(queryVector);
    const hits: SearchHit[] = [];
    for (const [chunkId, { vector, norm }] of this.entries) {
      // zero vectors have no direction; vectra would divide by zero
      const cosine =
        queryNorm === 0 || norm === 0 ? 0 : ItemSelector.normalizedCosineSimilarity(queryVector, queryNorm, vector, norm);
      hits.push({ distance: 1 - cosine, chunkId });
    }

    hits.sort((a, b) =>
      a.distance !== b.distance
        ? a.distance - b.distance
        : a.chunkId < b.chunkId
          ? -1
          : a.chunkId > b.chunkId
            ? 1
            : 0,
    );
    return hits.slice(0, k);
  }

  /** Rebuilds the entry map without the given ids. Returns how many were dropped. */
  remove(chunkIds: Iterable<string>): number {
    const doomed = new Set(chunkIds);
    const kept = new Map<string, StoredVector>();
    for (const [id, entry] of this.entries) {
      if (!doomed.has(id)) kept.set(id, entry);
    }
    const removed = this.entries.size - kept.size;
    this.entries = kept;
    return removed;
  }

  clear(): void {
    this.entries = new Map();
    this.dim = null;
  }

  vector(chunkId: string): number[] | undefined {
    const entry = this.entries.get(chunkId);
    return entry ? [...entry.vector] : undefined;
  }

  entriesSnapshot(): IndexEntry[] {
    return [...this.entries].map(([chunkId, { vector }]) => ({ chunkId, vector: [...vector] }));
  }

  /**
   * Writes the vector blob as a vectra index (rebuilt from scratch) plus a
   * header holding the dimension and count.
   */
  async save(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
    const indexPath = vectraPath(dir);
    await rm(indexPath, { recursive: true, force: true });

    const index = new LocalIndex(indexPath);
    await index.createIndex();
    await index.beginUpdate();
    for (const chunkId of [...this.entries.keys()].sort()) {
      const entry = this.entries.get(chunkId);
      if (!entry) continue;
      await index.insertItem({ id: chunkId, vector: entry.vector, metadata: { chunkId } });
    }
    await index.endUpdate();

    const header: IndexHeader = {
      version: INDEX_FORMAT_VERSION,
      dimension: this.dim,
      count: this.entries.size,
    };
    await writeFile(headerPath(dir), JSON.stringify(header, null, 2));
  }

  /** Returns null when nothing was ever saved under `dir`. */
  static async load(dir: string): Promise<VectorIndex | null> {
    let raw: string;
    try {
      raw = await readFile(headerPath(dir), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConsistencyError(
        "Index header is not valid JSON",
        { operation: "index.load", path: headerPath(dir) },
        { cause: err },
      );
    }
    const parsed = headerSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConsistencyError(`Unreadable index header: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
        operation: "index.load",
        path: headerPath(dir),
      });
    }
    const header = parsed.data;

    const index = new LocalIndex(vectraPath(dir));
    if (!(await index.isIndexCreated())) {
      throw new ConsistencyError("Index header present but vector data missing", {
        operation: "index.load",
        path: vectraPath(dir),
      });
    }

    const items = await index.listItems();
    if (items.length !== header.count) {
      throw new ConsistencyError(`Index holds ${items.length} vectors, header says ${header.count}`, {
        operation: "index.load",
      });
    }

    const loaded = new VectorIndex(header.dimension);
    loaded.add(
      items.map((item) => item.vector),
      items.map((item) => item.id),
    );
    return loaded;
  }
}
