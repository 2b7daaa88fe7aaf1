/**
 * Domain types shared by the normalizer, the synchronizer and the store adapters.
 * These decouple business logic from any particular storage backend.
 */

/** A single value produced by extraction. Any field may be missing or empty. */
export type RawValue = string | number | string[] | null | undefined;

export type RawRecord = Record<string, RawValue>;

/** A value after normalization. Absent values are omitted, never null. */
export type FieldValue = string | number | string[];

export type ListingFields = Record<string, FieldValue>;

export type UrlRejectionReason = "MissingURL" | "UnresolvableURL";

export type CanonicalizeResult =
  | { ok: true; url: string }
  | { ok: false; reason: UrlRejectionReason };

export interface CanonicalRecord {
  identityKey: string;
  source: string;
  /** Canonical primary listing URL, also present in `fields` under the primary field name */
  url: string;
  fields: ListingFields;
}

/** A secondary URL (or list entry) dropped during normalization */
export interface FieldWarning {
  field: string;
  value: string;
  reason: UrlRejectionReason;
}

export interface Rejection {
  reason: "InvalidPrimaryURL";
  cause: UrlRejectionReason;
  /** Position of the record in the input batch */
  index: number;
  raw: RawRecord;
}

export type NormalizeResult =
  | { ok: true; record: CanonicalRecord; warnings: FieldWarning[] }
  | { ok: false; rejection: Rejection };

export interface FieldChange {
  identityKey: string;
  field: string;
  oldValue: FieldValue | null;
  newValue: FieldValue | null;
  recordedAt: Date;
}

export interface StoredRecord {
  identityKey: string;
  source: string;
  fields: ListingFields;
  contentHash: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

export interface StoreWrite {
  source: string;
  fields: ListingFields;
  contentHash: string;
  seenAt: Date;
  /** Change-log entries persisted together with the row */
  changes: FieldChange[];
}

export type SyncOutcome = "inserted" | "updated" | "unchanged";

export interface ReconciliationReport {
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
  /** Records overwritten by a later record with the same identity key in the batch */
  superseded: number;
  /** Secondary URLs dropped from otherwise valid records */
  droppedUrls: number;
  rejections: Rejection[];
  changes: FieldChange[];
  startedAt: Date;
  finishedAt: Date | null;
}

export type SyncRunStatus = "running" | "completed" | "failed";

export type RunCounts = Pick<
  ReconciliationReport,
  "inserted" | "updated" | "unchanged" | "rejected" | "superseded"
>;

/** One ingest run of a site, as kept in the run log */
export interface SyncRun extends RunCounts {
  id: string;
  source: string;
  status: SyncRunStatus;
  startedAt: Date;
  finishedAt: Date | null;
  errorMessage: string | null;
}

export interface SyncRunResult {
  status: Exclude<SyncRunStatus, "running">;
  finishedAt: Date;
  counts: RunCounts;
  errorMessage: string | null;
}
