import { describe, it, expect } from "vitest";
import { InMemoryStore } from "../memoryStore";

const KEY = "https://www.apolar.com.br/imovel/1001";
const T1 = new Date("2026-03-01T10:00:00Z");
const T2 = new Date("2026-03-08T10:00:00Z");

describe("InMemoryStore", () => {
  it("returns null for an unknown key", async () => {
    const store = new InMemoryStore();

    expect(await store.get(KEY)).toBeNull();
  });

  it("keeps firstSeenAt when a row is overwritten", async () => {
    const store = new InMemoryStore();
    await store.put(KEY, {
      source: "apolar",
      fields: { rentPrice: 1850 },
      contentHash: "h1",
      seenAt: T1,
      changes: [],
    });
    await store.put(KEY, {
      source: "apolar",
      fields: { rentPrice: 1900 },
      contentHash: "h2",
      seenAt: T2,
      changes: [],
    });

    expect(await store.get(KEY)).toEqual({
      identityKey: KEY,
      source: "apolar",
      fields: { rentPrice: 1900 },
      contentHash: "h2",
      firstSeenAt: T1,
      lastSeenAt: T2,
    });
  });

  it("never moves lastSeenAt backwards", async () => {
    const store = new InMemoryStore();
    await store.put(KEY, { source: "apolar", fields: {}, contentHash: "h", seenAt: T2, changes: [] });
    await store.touch(KEY, T1);

    expect((await store.get(KEY))?.lastSeenAt).toEqual(T2);
  });

  it("ignores touch for an unknown key", async () => {
    const store = new InMemoryStore();
    await store.touch(KEY, T1);

    expect(store.size).toBe(0);
  });

  it("hands out copies", async () => {
    const store = new InMemoryStore();
    await store.put(KEY, {
      source: "apolar",
      fields: { images: ["a.jpg"] },
      contentHash: "h",
      seenAt: T1,
      changes: [],
    });

    const copy = await store.get(KEY);
    const images = copy?.fields.images;
    if (Array.isArray(images)) images.push("b.jpg");

    expect((await store.get(KEY))?.fields).toEqual({ images: ["a.jpg"] });
  });

  it("records change-log entries per key", async () => {
    const store = new InMemoryStore();
    const change = {
      identityKey: KEY,
      field: "rentPrice",
      oldValue: 1850,
      newValue: 1900,
      recordedAt: T2,
    };
    await store.put(KEY, {
      source: "apolar",
      fields: { rentPrice: 1900 },
      contentHash: "h",
      seenAt: T2,
      changes: [change],
    });

    expect(store.changes(KEY)).toEqual([change]);
    expect(store.changes("https://other.example/1")).toEqual([]);
  });

  it("keeps a run log", async () => {
    const store = new InMemoryStore();

    const runId = await store.startRun("apolar", T1);
    expect(store.runs()).toEqual([
      {
        id: runId,
        source: "apolar",
        status: "running",
        startedAt: T1,
        finishedAt: null,
        inserted: 0,
        updated: 0,
        unchanged: 0,
        rejected: 0,
        superseded: 0,
        errorMessage: null,
      },
    ]);

    await store.finishRun(runId, {
      status: "failed",
      finishedAt: T2,
      counts: { inserted: 3, updated: 1, unchanged: 0, rejected: 2, superseded: 0 },
      errorMessage: "connection refused",
    });

    expect(store.runs()[0]).toMatchObject({
      status: "failed",
      finishedAt: T2,
      inserted: 3,
      updated: 1,
      rejected: 2,
      errorMessage: "connection refused",
    });
  });

  it("ignores unknown run ids", async () => {
    const store = new InMemoryStore();

    await store.finishRun("run-9", {
      status: "completed",
      finishedAt: T2,
      counts: { inserted: 0, updated: 0, unchanged: 0, rejected: 0, superseded: 0 },
      errorMessage: null,
    });

    expect(store.runs()).toEqual([]);
  });
});
