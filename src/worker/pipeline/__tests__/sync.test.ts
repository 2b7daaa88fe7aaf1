import { describe, it, expect, vi, beforeEach } from "vitest";
import { StoreUnavailableError } from "@/lib/domain/errors";
import type {
  ListingFields,
  NormalizeResult,
  Rejection,
  StoreWrite,
  StoredRecord,
} from "@/lib/domain/types";
import { InMemoryStore } from "@/lib/store/memoryStore";
import { KeyedMutex } from "../keyLock";
import { syncListings } from "../sync";

const T1 = new Date("2026-03-01T10:00:00Z");
const T2 = new Date("2026-03-08T10:00:00Z");

const K1 = "https://www.apolar.com.br/imovel/1001";
const K2 = "https://www.apolar.com.br/imovel/1002";
const K3 = "https://www.apolar.com.br/imovel/1003";

function accepted(url: string, fields: ListingFields, warnings = 0): NormalizeResult {
  return {
    ok: true,
    record: { identityKey: url, source: "apolar", url, fields: { url, ...fields } },
    warnings: Array.from({ length: warnings }, () => ({
      field: "images",
      value: "javascript:void(0)",
      reason: "UnresolvableURL" as const,
    })),
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Records the order of store calls and lets reads take a while */
class SlowStore extends InMemoryStore {
  readonly events: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  async get(identityKey: string): Promise<StoredRecord | null> {
    this.events.push("get");
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    const row = await super.get(identityKey);
    await delay(10);
    this.inFlight--;
    return row;
  }

  async put(identityKey: string, write: StoreWrite): Promise<void> {
    this.events.push("put");
    return super.put(identityKey, write);
  }
}

/** Fails writes for one key while `failing` is set */
class FlakyStore extends InMemoryStore {
  failing = true;

  constructor(private readonly badKey: string) {
    super();
  }

  async put(identityKey: string, write: StoreWrite): Promise<void> {
    if (this.failing && identityKey === this.badKey) {
      throw new Error("connection refused");
    }
    return super.put(identityKey, write);
  }
}

describe("syncListings", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("inserts new records and stamps first/last seen", async () => {
    const store = new InMemoryStore();

    const report = await syncListings([accepted(K1, { rentPrice: 1850 })], store, {
      now: () => T1,
    });

    expect(report).toMatchObject({
      inserted: 1,
      updated: 0,
      unchanged: 0,
      rejected: 0,
      startedAt: T1,
      finishedAt: T1,
    });
    expect(await store.get(K1)).toMatchObject({
      fields: { url: K1, rentPrice: 1850 },
      firstSeenAt: T1,
      lastSeenAt: T1,
    });
  });

  it("only refreshes last seen when the content is the same", async () => {
    const store = new InMemoryStore();
    const batch = [accepted(K1, { rentPrice: 1850 })];
    await syncListings(batch, store, { now: () => T1 });

    const put = vi.spyOn(store, "put");
    const report = await syncListings(batch, store, { now: () => T2 });

    expect(report.unchanged).toBe(1);
    expect(report.inserted).toBe(0);
    expect(put).not.toHaveBeenCalled();
    expect(await store.get(K1)).toMatchObject({ firstSeenAt: T1, lastSeenAt: T2 });
    expect(store.size).toBe(1);
  });

  it("overwrites changed records and logs tracked field changes", async () => {
    const store = new InMemoryStore();
    const options = { trackedFields: ["rentPrice", "condoFee"] };
    await syncListings([accepted(K1, { rentPrice: 1850, condoFee: 420 })], store, {
      ...options,
      now: () => T1,
    });

    const report = await syncListings(
      [accepted(K1, { rentPrice: 1900, condoFee: 420, description: "Reformado" })],
      store,
      { ...options, now: () => T2 }
    );

    const expected = {
      identityKey: K1,
      field: "rentPrice",
      oldValue: 1850,
      newValue: 1900,
      recordedAt: T2,
    };
    expect(report.updated).toBe(1);
    expect(report.changes).toEqual([expected]);
    expect(store.changes(K1)).toEqual([expected]);
    expect(await store.get(K1)).toMatchObject({
      fields: { url: K1, rentPrice: 1900, condoFee: 420, description: "Reformado" },
      firstSeenAt: T1,
      lastSeenAt: T2,
    });
  });

  it("records a tracked field that disappears as a change to null", async () => {
    const store = new InMemoryStore();
    const options = { trackedFields: ["condoFee"] };
    await syncListings([accepted(K1, { condoFee: 420 })], store, { ...options, now: () => T1 });

    const report = await syncListings([accepted(K1, {})], store, { ...options, now: () => T2 });

    expect(report.changes).toEqual([
      { identityKey: K1, field: "condoFee", oldValue: 420, newValue: null, recordedAt: T2 },
    ]);
  });

  it("updates untracked fields without a change log entry", async () => {
    const store = new InMemoryStore();
    await syncListings([accepted(K1, { city: "Curitiba" })], store, { now: () => T1 });

    const report = await syncListings([accepted(K1, { city: "Londrina" })], store, {
      now: () => T2,
    });

    expect(report.updated).toBe(1);
    expect(report.changes).toEqual([]);
    expect(store.changes()).toEqual([]);
  });

  it("treats a change in tracking parameters alone as unchanged", async () => {
    const store = new InMemoryStore();
    const seen = (query: string): NormalizeResult => ({
      ok: true,
      record: {
        identityKey: K1,
        source: "apolar",
        url: `${K1}?${query}`,
        fields: { url: `${K1}?${query}`, rentPrice: 1850 },
      },
      warnings: [],
    });
    await syncListings([seen("utm_source=portal")], store, { now: () => T1 });

    const report = await syncListings([seen("utm_source=newsletter")], store, { now: () => T2 });

    expect(report.unchanged).toBe(1);
    expect(report.updated).toBe(0);
    expect(await store.get(K1)).toMatchObject({ lastSeenAt: T2 });
  });

  it("keeps the later of two records with the same key", async () => {
    const store = new InMemoryStore();

    const report = await syncListings(
      [accepted(K1, { rentPrice: 1850 }), accepted(K2, {}), accepted(K1, { rentPrice: 1900 })],
      store,
      { now: () => T1 }
    );

    expect(report.inserted).toBe(2);
    expect(report.superseded).toBe(1);
    expect((await store.get(K1))?.fields.rentPrice).toBe(1900);
  });

  it("reports rejections and dropped URLs without writing them", async () => {
    const store = new InMemoryStore();
    const rejection: Rejection = {
      reason: "InvalidPrimaryURL",
      cause: "MissingURL",
      index: 1,
      raw: { property_url: "" },
    };

    const report = await syncListings([accepted(K1, {}, 2), { ok: false, rejection }], store, {
      now: () => T1,
    });

    expect(report.inserted).toBe(1);
    expect(report.rejected).toBe(1);
    expect(report.rejections).toEqual([rejection]);
    expect(report.droppedUrls).toBe(2);
    expect(store.size).toBe(1);
  });

  it("serializes concurrent syncs of the same key on one store", async () => {
    const store = new SlowStore();

    const [first, second] = await Promise.all([
      syncListings([accepted(K1, { rentPrice: 1850 })], store, { now: () => T1 }),
      syncListings([accepted(K1, { rentPrice: 1900 })], store, { now: () => T2 }),
    ]);

    expect(store.events).toEqual(["get", "put", "get", "put"]);
    expect(first.inserted).toBe(1);
    expect(second.updated).toBe(1);
    expect((await store.get(K1))?.fields.rentPrice).toBe(1900);
  });

  it("races when each sync brings its own lock", async () => {
    const store = new SlowStore();

    const [first, second] = await Promise.all([
      syncListings([accepted(K1, { rentPrice: 1850 })], store, {
        now: () => T1,
        lock: new KeyedMutex(),
      }),
      syncListings([accepted(K1, { rentPrice: 1900 })], store, {
        now: () => T2,
        lock: new KeyedMutex(),
      }),
    ]);

    expect(store.events).toEqual(["get", "get", "put", "put"]);
    expect(first.inserted).toBe(1);
    expect(second.inserted).toBe(1);
  });

  it("never has more keys in flight than the concurrency limit", async () => {
    const store = new SlowStore();
    const batch = [1, 2, 3, 4, 5].map((n) =>
      accepted(`https://www.apolar.com.br/imovel/${n}`, {})
    );

    const report = await syncListings(batch, store, { concurrency: 3, now: () => T1 });

    expect(report.inserted).toBe(5);
    expect(store.maxInFlight).toBe(3);
  });

  it.each([Number("eight"), 0, -2, Infinity])(
    "refuses a concurrency of %s instead of skipping the batch",
    async (concurrency) => {
      const store = new InMemoryStore();

      await expect(
        syncListings([accepted(K1, {})], store, { concurrency, now: () => T1 })
      ).rejects.toThrow(RangeError);
      expect(store.size).toBe(0);
    }
  );

  it("stops on a store failure and lists the keys still pending", async () => {
    const store = new FlakyStore(K2);
    const batch = [accepted(K1, {}), accepted(K2, {}), accepted(K3, {})];

    const error = await syncListings(batch, store, { concurrency: 1, now: () => T1 }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(StoreUnavailableError);
    if (!(error instanceof StoreUnavailableError)) return;
    expect(error.failedKey).toBe(K2);
    expect(error.pendingKeys).toEqual([K2, K3]);
    expect(error.report.inserted).toBe(1);
    expect(error.report.finishedAt).toEqual(T1);
    expect(store.size).toBe(1);
  });

  it("converges when a failed batch is run again", async () => {
    const store = new FlakyStore(K2);
    const batch = [accepted(K1, {}), accepted(K2, {}), accepted(K3, {})];
    await expect(
      syncListings(batch, store, { concurrency: 1, now: () => T1 })
    ).rejects.toBeInstanceOf(StoreUnavailableError);

    store.failing = false;
    const report = await syncListings(batch, store, { concurrency: 1, now: () => T2 });

    expect(report).toMatchObject({ inserted: 2, unchanged: 1, updated: 0 });
    expect(store.size).toBe(3);
  });
});
