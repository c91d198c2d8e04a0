import { writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConsistencyError, DimensionMismatchError, DuplicateChunkError } from "../rag/errors.js";
import { VectorIndex, headerPath } from "../rag/vector-store.js";
import { makeTempDir, removeDir } from "./fakes.js";

function sampleIndex(): VectorIndex {
  const index = new VectorIndex();
  index.add(
    [
      [1, 0],
      [0, 1],
      [1, 1],
    ],
    ["a", "b", "c"],
  );
  return index;
}

describe("VectorIndex", () => {
  it("returns hits in ascending cosine distance", () => {
    const hits = sampleIndex().search([1, 0], 3);
    expect(hits.map((h) => h.chunkId)).toEqual(["a", "c", "b"]);
    expect(hits[0]?.distance).toBeCloseTo(0);
    expect(hits[1]?.distance).toBeCloseTo(1 - Math.SQRT1_2);
    expect(hits[2]?.distance).toBeCloseTo(1);
  });

  it("breaks distance ties by chunk id", () => {
    const index = new VectorIndex();
    index.add(
      [
        [2, 0],
        [1, 0],
      ],
      ["z", "m"],
    );
    expect(index.search([1, 0], 2).map((h) => h.chunkId)).toEqual(["m", "z"]);
  });

  it("returns everything when k exceeds the size, and nothing for k <= 0 or an empty index", () => {
    expect(sampleIndex().search([1, 0], 10)).toHaveLength(3);
    expect(sampleIndex().search([1, 0], 0)).toEqual([]);
    expect(new VectorIndex().search([1, 0], 5)).toEqual([]);
  });

  it("scores a zero vector as orthogonal to everything", () => {
    const index = new VectorIndex();
    index.add(
      [
        [0, 0],
        [3, 4],
      ],
      ["zero", "x"],
    );
    expect(index.search([3, 4], 2)).toEqual([
      { chunkId: "x", distance: 0 },
      { chunkId: "zero", distance: 1 },
    ]);
    expect(index.search([0, 0], 2)).toEqual([
      { chunkId: "x", distance: 1 },
      { chunkId: "zero", distance: 1 },
    ]);
  });

  it("fixes the dimension at the first insertion", () => {
    const index = sampleIndex();
    expect(index.dimension).toBe(2);
    expect(() => index.add([[1, 0, 0]], ["d"])).toThrow(DimensionMismatchError);
    expect(() => index.search([1, 0, 0], 1)).toThrow(DimensionMismatchError);
    expect(index.size()).toBe(3);
  });

  it("validates the whole batch before inserting any of it", () => {
    const index = new VectorIndex();
    expect(() =>
      index.add(
        [
          [1, 0],
          [0, 1],
        ],
        ["a", "a"],
      ),
    ).toThrow(DuplicateChunkError);
    expect(() => index.add([[1, 0]], ["a", "b"])).toThrow(RangeError);
    expect(index.size()).toBe(0);
    expect(index.dimension).toBeNull();
  });

  it("removes by id and forgets the dimension on clear", () => {
    const index = sampleIndex();
    expect(index.remove(["a", "missing"])).toBe(1);
    expect(index.ids()).toEqual(["b", "c"]);

    index.clear();
    expect(index.size()).toBe(0);
    index.add([[1, 2, 3]], ["x"]);
    expect(index.dimension).toBe(3);
  });
});

describe("VectorIndex persistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("round-trips vectors and ids", async () => {
    const index = sampleIndex();
    await index.save(dir);

    const loaded = await VectorIndex.load(dir);
    expect(loaded?.dimension).toBe(2);
    expect(loaded?.entriesSnapshot().sort((a, b) => a.chunkId.localeCompare(b.chunkId))).toEqual([
      { chunkId: "a", vector: [1, 0] },
      { chunkId: "b", vector: [0, 1] },
      { chunkId: "c", vector: [1, 1] },
    ]);
    expect(loaded?.search([0, 1], 1).map((h) => h.chunkId)).toEqual(["b"]);
  });

  it("answers every query the same after a reload", async () => {
    const index = new VectorIndex();
    index.add(
      [
        [1, 0],
        [1, 0],
        [0, 1],
        [3, 4],
        [-1, 0],
      ],
      ["b", "a", "c", "e", "d"],
    );
    await index.save(dir);
    const loaded = await VectorIndex.load(dir);

    const queries = [
      [1, 0],
      [0, 1],
      [1, 1],
      [-2, 1],
    ];
    for (const query of queries) {
      expect(loaded?.search(query, 10)).toEqual(index.search(query, 10));
      expect(loaded?.search(query, 2)).toEqual(index.search(query, 2));
    }
    expect(loaded?.search([1, 0], 2).map((h) => h.chunkId)).toEqual(["a", "b"]);
  });

  it("returns null when nothing was saved", async () => {
    expect(await VectorIndex.load(dir)).toBeNull();
  });

  it("rejects a header whose count disagrees with the stored vectors", async () => {
    await sampleIndex().save(dir);
    await writeFile(headerPath(dir), JSON.stringify({ version: 1, dimension: 2, count: 5 }));
    await expect(VectorIndex.load(dir)).rejects.toBeInstanceOf(ConsistencyError);
  });

  it("rejects a header without vector data", async () => {
    await writeFile(headerPath(dir), JSON.stringify({ version: 1, dimension: 2, count: 0 }));
    await expect(VectorIndex.load(dir)).rejects.toBeInstanceOf(ConsistencyError);
  });
});
