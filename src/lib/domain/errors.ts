import type { ReconciliationReport } from "./types";

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised when a site configuration is built from invalid values.
 * Always thrown at construction time, before any record is processed.
 */
export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(site: string, issues: ConfigIssue[]) {
    const summary = issues
      .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
      .join("; ");
    super(`Invalid site config "${site}": ${summary}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * A store call failed mid-batch. Keys in `pendingKeys` were not confirmed
 * written and are safe to retry with the same input.
 */
export class StoreUnavailableError extends Error {
  readonly failedKey: string;
  readonly pendingKeys: string[];
  readonly report: ReconciliationReport;

  constructor(
    failedKey: string,
    pendingKeys: string[],
    report: ReconciliationReport,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Store unavailable while syncing ${failedKey} (${pendingKeys.length} keys pending): ${reason}`,
      { cause }
    );
    this.name = "StoreUnavailableError";
    this.failedKey = failedKey;
    this.pendingKeys = pendingKeys;
    this.report = report;
  }
}
