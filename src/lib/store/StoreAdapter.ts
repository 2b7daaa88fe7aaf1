import type {
  StoreWrite,
  StoredRecord,
  SyncRunResult,
} from "@/lib/domain/types";

/**
 * Interface every listing store must implement. Each call is atomic for its
 * key, and `put` with identical arguments is idempotent.
 */
export interface StoreAdapter {
  /** Return the stored listing for an identity key, or null if none exists */
  get(identityKey: string): Promise<StoredRecord | null>;

  /**
   * Insert or overwrite a listing together with its change-log entries.
   * `firstSeenAt` of an existing row is kept.
   */
  put(identityKey: string, write: StoreWrite): Promise<void>;

  /** Refresh last-seen without touching field data */
  touch(identityKey: string, seenAt: Date): Promise<void>;

  /** Open a run-log entry in status "running"; returns its id */
  startRun?(source: string, startedAt: Date): Promise<string>;

  /** Close a run-log entry. Unknown ids are ignored. */
  finishRun?(runId: string, result: SyncRunResult): Promise<void>;
}
