import { describe, expect, it } from "vitest";
import { buildChunks } from "../rag/chunking/index.js";
import { buildContext, chunkLabel, formatSourcesForUI } from "../rag/context-builder.js";
import { CHUNKING, makeChunk, messyDocument, salesAnalysis } from "./fakes.js";

const [analysisChunk, firstRows] = buildChunks(messyDocument("sales", 10), salesAnalysis(), CHUNKING);
const noteChunk = makeChunk("notes", 2, "Meeting notes from March.");

function scored(...chunks: (typeof noteChunk | undefined)[]) {
  return chunks.flatMap((chunk) => (chunk ? [{ chunk, score: 0.5 }] : []));
}

describe("chunkLabel", () => {
  it("describes where a chunk sits in its source", () => {
    expect(analysisChunk && chunkLabel(analysisChunk)).toBe("analysis");
    expect(firstRows && chunkLabel(firstRows)).toBe("sales.csv rows 1-4");
    expect(chunkLabel(noteChunk)).toBe("part 3");
  });
});

describe("buildContext", () => {
  it("returns null when nothing was retrieved", () => {
    expect(buildContext([], 1_000)).toBeNull();
  });

  it("cites every excerpt and groups sources by file", () => {
    const context = buildContext(scored(analysisChunk, firstRows, noteChunk), 100_000);

    expect(context?.systemSuffix).toContain("[Source: notes.txt, part 3]\nMeeting notes from March.");
    expect(context?.systemSuffix).toContain(`[Source: sales.csv, analysis]\n${analysisChunk?.text}`);
    expect(context?.sources).toEqual([
      { source: "sales.csv", labels: ["analysis", "sales.csv rows 1-4"] },
      { source: "notes.txt", labels: ["part 3"] },
    ]);
    expect(formatSourcesForUI(context?.sources ?? [])).toBe(
      "sales.csv (analysis, sales.csv rows 1-4) | notes.txt (part 3)",
    );
  });

  it("stops adding excerpts at the size limit but always keeps the best one", () => {
    const context = buildContext(scored(noteChunk, analysisChunk), 40);
    expect(context?.sources).toEqual([{ source: "notes.txt", labels: ["part 3"] }]);
    expect(context?.systemSuffix.endsWith("[Source: notes.txt, part 3]\nMeeting note")).toBe(true);
  });
});
