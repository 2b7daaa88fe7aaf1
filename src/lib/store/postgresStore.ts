import * as fs from "fs";
import * as path from "path";
import type { Pool } from "pg";
import type {
  FieldValue,
  ListingFields,
  StoreWrite,
  StoredRecord,
  SyncRunResult,
} from "@/lib/domain/types";
import type { StoreAdapter } from "./StoreAdapter";

const SCHEMA_FILE = path.resolve(process.cwd(), "db/schema.sql");

interface ListingRow {
  identity_key: string;
  source: string;
  fields: ListingFields;
  content_hash: string;
  first_seen_at: Date;
  last_seen_at: Date;
}

function toJson(value: FieldValue | null): string | null {
  return value === null ? null : JSON.stringify(value);
}

/**
 * PostgreSQL-backed listing store. Each `put` runs in its own transaction so
 * the row and its change-log entries land together.
 */
export class PostgresStore implements StoreAdapter {
  constructor(private readonly pool: Pool) {}

  /** Create tables and indexes if they don't exist yet. */
  async migrate(schemaFile = SCHEMA_FILE): Promise<void> {
    const sql = fs.readFileSync(schemaFile, "utf-8");
    await this.pool.query(sql);
  }

  async get(identityKey: string): Promise<StoredRecord | null> {
    const result = await this.pool.query<ListingRow>(
      `SELECT identity_key, source, fields, content_hash, first_seen_at, last_seen_at
         FROM listings
        WHERE identity_key = $1`,
      [identityKey]
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      identityKey: row.identity_key,
      source: row.source,
      fields: row.fields,
      contentHash: row.content_hash,
      firstSeenAt: row.first_seen_at,
      lastSeenAt: row.last_seen_at,
    };
  }

  async put(identityKey: string, write: StoreWrite): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(
        `INSERT INTO listings
           (identity_key, source, fields, content_hash, first_seen_at, last_seen_at)
         VALUES ($1, $2, $3::jsonb, $4, $5, $5)
         ON CONFLICT (identity_key) DO UPDATE SET
           source = EXCLUDED.source,
           fields = EXCLUDED.fields,
           content_hash = EXCLUDED.content_hash,
           last_seen_at = GREATEST(listings.last_seen_at, EXCLUDED.last_seen_at)`,
        [
          identityKey,
          write.source,
          JSON.stringify(write.fields),
          write.contentHash,
          write.seenAt,
        ]
      );
      for (const change of write.changes) {
        await client.query(
          `INSERT INTO listing_changes
             (identity_key, field, old_value, new_value, recorded_at)
           VALUES ($1, $2, $3::jsonb, $4::jsonb, $5)`,
          [
            identityKey,
            change.field,
            toJson(change.oldValue),
            toJson(change.newValue),
            change.recordedAt,
          ]
        );
      }
      await client.query("COMMIT");
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        console.error(`[store] Rollback failed for ${identityKey}:`, rollbackErr);
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async touch(identityKey: string, seenAt: Date): Promise<void> {
    await this.pool.query(
      `UPDATE listings
          SET last_seen_at = GREATEST(last_seen_at, $2)
        WHERE identity_key = $1`,
      [identityKey, seenAt]
    );
  }

  async startRun(source: string, startedAt: Date): Promise<string> {
    const result = await this.pool.query<{ id: string }>(
      `INSERT INTO sync_runs (source, status, started_at)
       VALUES ($1, 'running', $2)
       RETURNING id`,
      [source, startedAt]
    );
    const row = result.rows[0];
    if (!row) throw new Error(`No run id returned for ${source}`);
    return String(row.id);
  }

  async finishRun(runId: string, result: SyncRunResult): Promise<void> {
    const { counts } = result;
    await this.pool.query(
      `UPDATE sync_runs
          SET status = $2, finished_at = $3, inserted = $4, updated = $5,
              unchanged = $6, rejected = $7, superseded = $8, error_message = $9
        WHERE id = $1`,
      [
        runId,
        result.status,
        result.finishedAt,
        counts.inserted,
        counts.updated,
        counts.unchanged,
        counts.rejected,
        counts.superseded,
        result.errorMessage,
      ]
    );
  }
}
