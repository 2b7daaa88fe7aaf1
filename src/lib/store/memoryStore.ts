import type {
  FieldChange,
  StoreWrite,
  StoredRecord,
  SyncRun,
  SyncRunResult,
} from "@/lib/domain/types";
import type { StoreAdapter } from "./StoreAdapter";

function clone(record: StoredRecord): StoredRecord {
  return structuredClone(record);
}

function later(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * Map-backed store for tests and dry runs. Returns copies so callers can't
 * mutate stored state.
 */
export class InMemoryStore implements StoreAdapter {
  private readonly rows = new Map<string, StoredRecord>();
  private readonly changeLog: FieldChange[] = [];
  private readonly runLog = new Map<string, SyncRun>();

  async get(identityKey: string): Promise<StoredRecord | null> {
    const row = this.rows.get(identityKey);
    return row ? clone(row) : null;
  }

  async put(identityKey: string, write: StoreWrite): Promise<void> {
    const existing = this.rows.get(identityKey);
    this.rows.set(identityKey, {
      identityKey,
      source: write.source,
      fields: structuredClone(write.fields),
      contentHash: write.contentHash,
      firstSeenAt: existing?.firstSeenAt ?? write.seenAt,
      lastSeenAt: existing ? later(existing.lastSeenAt, write.seenAt) : write.seenAt,
    });
    this.changeLog.push(...write.changes.map((c) => structuredClone(c)));
  }

  async touch(identityKey: string, seenAt: Date): Promise<void> {
    const existing = this.rows.get(identityKey);
    if (!existing) return;
    existing.lastSeenAt = later(existing.lastSeenAt, seenAt);
  }

  async startRun(source: string, startedAt: Date): Promise<string> {
    const id = `run-${this.runLog.size + 1}`;
    this.runLog.set(id, {
      id,
      source,
      status: "running",
      startedAt,
      finishedAt: null,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      rejected: 0,
      superseded: 0,
      errorMessage: null,
    });
    return id;
  }

  async finishRun(runId: string, result: SyncRunResult): Promise<void> {
    const run = this.runLog.get(runId);
    if (!run) return;
    this.runLog.set(runId, {
      ...run,
      ...result.counts,
      status: result.status,
      finishedAt: result.finishedAt,
      errorMessage: result.errorMessage,
    });
  }

  get size(): number {
    return this.rows.size;
  }

  all(): StoredRecord[] {
    return [...this.rows.values()].map(clone);
  }

  runs(): SyncRun[] {
    return [...this.runLog.values()].map((r) => structuredClone(r));
  }

  changes(identityKey?: string): FieldChange[] {
    return this.changeLog
      .filter((c) => identityKey === undefined || c.identityKey === identityKey)
      .map((c) => structuredClone(c));
  }
}
