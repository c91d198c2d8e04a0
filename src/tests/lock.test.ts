import { describe, expect, it } from "vitest";
import { ReadWriteLock } from "../rag/lock.js";
import { deferred } from "./fakes.js";

describe("ReadWriteLock", () => {
  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const gate = deferred();

    const slow = lock.read(async () => {
      events.push("r1-start");
      await gate.promise;
      events.push("r1-end");
    });
    await lock.read(() => {
      events.push("r2");
    });
    expect(events).toEqual(["r1-start", "r2"]);

    gate.resolve();
    await slow;
    expect(events).toEqual(["r1-start", "r2", "r1-end"]);
  });

  it("holds readers back until a writer finishes", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const gate = deferred();

    const write = lock.write(async () => {
      events.push("write-start");
      await gate.promise;
      events.push("write-end");
    });
    const read = lock.read(() => {
      events.push("read");
    });

    gate.resolve();
    await Promise.all([write, read]);
    expect(events).toEqual(["write-start", "write-end", "read"]);
  });

  it("serves waiters in arrival order", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    const gate = deferred();

    const r1 = lock.read(async () => {
      await gate.promise;
      events.push("r1");
    });
    const w = lock.write(() => {
      events.push("w");
    });
    const r2 = lock.read(() => {
      events.push("r2");
    });

    gate.resolve();
    await Promise.all([r1, w, r2]);
    expect(events).toEqual(["r1", "w", "r2"]);
  });

  it("releases the lock when the holder throws", async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.write(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.read(() => "still usable")).resolves.toBe("still usable");
  });
});
