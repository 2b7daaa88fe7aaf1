/**
 * CSS-selector extraction of raw listing records from saved HTML pages.
 */
import * as cheerio from "cheerio";
import type { CssExtraction } from "@/lib/domain/siteConfig";
import type { RawRecord } from "@/lib/domain/types";

function clean(value: string | undefined): string | null {
  if (value === undefined) return null;
  const text = value.replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
}

/**
 * Produce one raw record per element matching `baseSelector`.
 * Single-valued fields take the first non-empty match; `multiple` fields
 * collect every match (possibly an empty list).
 */
export function extractRecords(html: string, extraction: CssExtraction): RawRecord[] {
  const $ = cheerio.load(html);
  const records: RawRecord[] = [];

  $(extraction.baseSelector).each((_, baseEl) => {
    const record: RawRecord = {};

    for (const field of extraction.fields) {
      const values: string[] = [];
      $(baseEl)
        .find(field.selector)
        .each((_, el) => {
          const raw =
            field.type === "attribute" && field.attribute
              ? $(el).attr(field.attribute)
              : $(el).text();
          const value = clean(raw);
          if (value !== null) values.push(value);
        });

      if (field.multiple) {
        record[field.name] = values;
      } else if (values.length > 0) {
        record[field.name] = values[0];
      }
    }

    records.push(record);
  });

  return records;
}
