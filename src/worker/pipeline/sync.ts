import { StoreUnavailableError } from "@/lib/domain/errors";
import { contentHash, stableStringify } from "@/lib/domain/hash";
import type {
  CanonicalRecord,
  FieldChange,
  ListingFields,
  NormalizeResult,
  ReconciliationReport,
  SyncOutcome,
} from "@/lib/domain/types";
import type { StoreAdapter } from "@/lib/store/StoreAdapter";
import { KeyedMutex, lockFor } from "./keyLock";

export const DEFAULT_SYNC_CONCURRENCY = 8;

export interface SyncOptions {
  /** Max distinct keys written in parallel */
  concurrency?: number;
  /** Fields whose old/new values are written to the change log on update */
  trackedFields?: readonly string[];
  /** Clock for the run's last-seen timestamp */
  now?: () => Date;
  /** Defaults to the mutex shared by all syncs on the same store */
  lock?: KeyedMutex;
}

interface KeyResult {
  outcome: SyncOutcome;
  changes: FieldChange[];
}

export function emptyReport(startedAt: Date): ReconciliationReport {
  return {
    inserted: 0,
    updated: 0,
    unchanged: 0,
    rejected: 0,
    superseded: 0,
    droppedUrls: 0,
    rejections: [],
    changes: [],
    startedAt,
    finishedAt: null,
  };
}

/**
 * Collapse a batch to one record per identity key. The later record in input
 * order wins, so the last extraction of a page is authoritative.
 */
export function reduceBatch(
  results: NormalizeResult[],
  report: ReconciliationReport
): Map<string, CanonicalRecord> {
  const batch = new Map<string, CanonicalRecord>();
  for (const result of results) {
    if (!result.ok) {
      report.rejected++;
      report.rejections.push(result.rejection);
      continue;
    }
    report.droppedUrls += result.warnings.length;
    if (batch.has(result.record.identityKey)) report.superseded++;
    batch.set(result.record.identityKey, result.record);
  }
  return batch;
}

function diffTracked(
  identityKey: string,
  before: ListingFields,
  after: ListingFields,
  trackedFields: readonly string[],
  recordedAt: Date
): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of trackedFields) {
    const oldValue = before[field] ?? null;
    const newValue = after[field] ?? null;
    if (stableStringify(oldValue) !== stableStringify(newValue)) {
      changes.push({ identityKey, field, oldValue, newValue, recordedAt });
    }
  }
  return changes;
}

/**
 * Hash of a record's content. The primary URL is hashed as its identity key,
 * so a change in tracking parameters alone is not a content change.
 */
export function recordHash(record: CanonicalRecord): string {
  const fields: ListingFields = {};
  for (const [name, value] of Object.entries(record.fields)) {
    fields[name] = value === record.url ? record.identityKey : value;
  }
  return contentHash(fields);
}

/**
 * Reconcile one record with the store:
 * - not found: insert
 * - hash differs: overwrite fields + change log
 * - hash equal: refresh last-seen only
 */
async function syncOne(
  record: CanonicalRecord,
  store: StoreAdapter,
  seenAt: Date,
  trackedFields: readonly string[]
): Promise<KeyResult> {
  const hash = recordHash(record);
  const existing = await store.get(record.identityKey);

  if (!existing) {
    await store.put(record.identityKey, {
      source: record.source,
      fields: record.fields,
      contentHash: hash,
      seenAt,
      changes: [],
    });
    return { outcome: "inserted", changes: [] };
  }

  if (existing.contentHash === hash) {
    await store.touch(record.identityKey, seenAt);
    return { outcome: "unchanged", changes: [] };
  }

  const changes = diffTracked(
    record.identityKey,
    existing.fields,
    record.fields,
    trackedFields,
    seenAt
  );
  await store.put(record.identityKey, {
    source: record.source,
    fields: record.fields,
    contentHash: hash,
    seenAt,
    changes,
  });
  return { outcome: "updated", changes };
}

/**
 * Synchronize a batch of normalization results against a store.
 *
 * Rejections are collected into the report. Accepted records are reduced by
 * identity key before any write, then each key is reconciled under a per-key
 * lock; distinct keys run in parallel. A store failure stops new keys from
 * starting and surfaces as StoreUnavailableError listing the keys that were
 * not confirmed written. Re-running the same batch is safe.
 */
export async function syncListings(
  results: NormalizeResult[],
  store: StoreAdapter,
  options: SyncOptions = {}
): Promise<ReconciliationReport> {
  const now = options.now ?? (() => new Date());
  const trackedFields = options.trackedFields ?? [];
  const lock = options.lock ?? lockFor(store);
  const concurrency = Math.floor(options.concurrency ?? DEFAULT_SYNC_CONCURRENCY);
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new RangeError(`Invalid sync concurrency: ${options.concurrency}`);
  }

  const seenAt = now();
  const report = emptyReport(seenAt);
  const records = [...reduceBatch(results, report).values()];

  const confirmed = new Set<string>();
  const failures: Array<{ key: string; error: unknown }> = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (failures.length === 0 && next < records.length) {
      const record = records[next++];
      const key = record.identityKey;
      try {
        const { outcome, changes } = await lock.run(key, () =>
          syncOne(record, store, seenAt, trackedFields)
        );
        report[outcome]++;
        report.changes.push(...changes);
        confirmed.add(key);

        if (outcome !== "unchanged") {
          console.log(`[sync] ${outcome} ${key}`);
        }
        for (const change of changes) {
          console.log(
            `[sync] ${change.field} change on ${key}: ${stableStringify(change.oldValue)} -> ${stableStringify(change.newValue)}`
          );
        }
      } catch (error) {
        failures.push({ key, error });
      }
    }
  };

  const workers = Math.min(concurrency, records.length);
  await Promise.all(Array.from({ length: workers }, () => worker()));

  report.finishedAt = now();

  if (failures.length > 0) {
    const [first] = failures;
    const pendingKeys = records
      .map((r) => r.identityKey)
      .filter((key) => !confirmed.has(key));
    console.error(
      `[sync] Store failure on ${first.key}; ${pendingKeys.length} keys not confirmed`,
      first.error
    );
    throw new StoreUnavailableError(first.key, pendingKeys, report, first.error);
  }

  return report;
}
