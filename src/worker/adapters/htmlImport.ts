import * as fs from "fs";
import * as path from "path";
import type { RawRecord } from "@/lib/domain/types";
import type { SiteConfig } from "@/lib/domain/siteConfig";
import { extractRecords } from "../html/extract";
import type { SourceAdapter } from "./SourceAdapter";

/**
 * Import listings from saved listing-page HTML files (*.html in a folder),
 * using the site's CSS extraction rules. Files are read in name order.
 */
export function htmlImportAdapter(dir: string, config: SiteConfig): SourceAdapter {
  return {
    name: `html:${dir}`,

    async extract(): Promise<RawRecord[]> {
      const extraction = config.extraction;
      if (!extraction) {
        throw new Error(`Site "${config.name}" has no extraction rules for HTML import`);
      }
      if (!fs.existsSync(dir)) {
        throw new Error(`Import directory not found: ${dir}`);
      }

      const htmlFiles = fs
        .readdirSync(dir)
        .filter((f) => f.endsWith(".html"))
        .sort();

      if (htmlFiles.length === 0) {
        console.log(`[adapter] No .html files found in ${dir}`);
        return [];
      }

      const records: RawRecord[] = [];
      for (const file of htmlFiles) {
        const html = fs.readFileSync(path.join(dir, file), "utf-8");
        const extracted = extractRecords(html, extraction);
        console.log(`[adapter] ${file}: extracted ${extracted.length} listings`);
        records.push(...extracted);
      }
      return records;
    },
  };
}
