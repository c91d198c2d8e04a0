import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";

describe("terminal entry point", () => {
  it("starts with a node shebang so the installed bin runs", async () => {
    const source = await readFile(new URL("../index.ts", import.meta.url), "utf-8");
    expect(source.split("\n", 1)[0]).toBe("#!/usr/bin/env node");
  });
});
