import { StoreUnavailableError } from "@/lib/domain/errors";
import { normalizeBatch } from "@/lib/domain/normalize";
import type { SiteConfig } from "@/lib/domain/siteConfig";
import type {
  RawRecord,
  ReconciliationReport,
  RunCounts,
} from "@/lib/domain/types";
import type { StoreAdapter } from "@/lib/store/StoreAdapter";
import type { SourceAdapter } from "../adapters/SourceAdapter";
import { syncListings, type SyncOptions } from "./sync";

export type IngestOptions = Omit<SyncOptions, "trackedFields">;

/**
 * Normalize a batch of raw records for one site and sync it to the store.
 * Idempotent: re-running the same batch won't create duplicates.
 */
export async function ingestBatch(
  raws: RawRecord[],
  config: SiteConfig,
  store: StoreAdapter,
  opts: IngestOptions = {}
): Promise<ReconciliationReport> {
  const results = normalizeBatch(raws, config);
  return syncListings(results, store, {
    ...opts,
    trackedFields: config.trackedFields,
  });
}

function countsOf(report: ReconciliationReport): RunCounts {
  const { inserted, updated, unchanged, rejected, superseded } = report;
  return { inserted, updated, unchanged, rejected, superseded };
}

const NO_COUNTS: RunCounts = { inserted: 0, updated: 0, unchanged: 0, rejected: 0, superseded: 0 };

async function recordFailedRun(
  store: StoreAdapter,
  runId: string,
  error: unknown,
  finishedAt: Date
): Promise<void> {
  if (!store.finishRun) return;
  try {
    await store.finishRun(runId, {
      status: "failed",
      finishedAt,
      counts: error instanceof StoreUnavailableError ? countsOf(error.report) : NO_COUNTS,
      errorMessage: error instanceof Error ? error.message : String(error),
    });
  } catch (logErr) {
    // the run's own error is rethrown by the caller
    console.error(`[ingest] Could not record failed run ${runId}:`, logErr);
  }
}

/**
 * Run the full pipeline for one adapter: extract -> normalize -> sync.
 * Stores with a run log get one entry per call, marked completed or failed.
 */
export async function ingestAdapter(
  adapter: SourceAdapter,
  config: SiteConfig,
  store: StoreAdapter,
  opts: IngestOptions = {}
): Promise<ReconciliationReport> {
  const now = opts.now ?? (() => new Date());
  const runId = store.startRun ? await store.startRun(config.name, now()) : null;

  let report: ReconciliationReport;
  try {
    console.log(`[ingest] ${config.name}: extracting from ${adapter.name}`);
    const raws = await adapter.extract();
    console.log(`[ingest] ${config.name}: ${raws.length} raw records`);

    report = await ingestBatch(raws, config, store, opts);
  } catch (err) {
    if (runId !== null) await recordFailedRun(store, runId, err, now());
    throw err;
  }

  if (runId !== null && store.finishRun) {
    await store.finishRun(runId, {
      status: "completed",
      finishedAt: report.finishedAt ?? now(),
      counts: countsOf(report),
      errorMessage: null,
    });
  }

  for (const rejection of report.rejections) {
    console.warn(
      `[ingest] ${config.name}: rejected record #${rejection.index} (${rejection.reason}: ${rejection.cause})`
    );
  }
  console.log(
    `[ingest] ${config.name}: finished, ${report.inserted} inserted, ${report.updated} updated, ` +
      `${report.unchanged} unchanged, ${report.rejected} rejected, ${report.superseded} superseded`
  );
  return report;
}
