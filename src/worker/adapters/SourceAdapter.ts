import type { RawRecord } from "@/lib/domain/types";

/**
 * Interface that every listing source must implement.
 * An adapter hands over the raw records extracted for one site; it knows
 * nothing about canonical URLs or the store.
 */
export interface SourceAdapter {
  /** Human-readable name for logs (e.g. "json:extractions/apolar.json") */
  name: string;

  /** Return the raw records of one crawl, in extraction order */
  extract(): Promise<RawRecord[]>;
}
