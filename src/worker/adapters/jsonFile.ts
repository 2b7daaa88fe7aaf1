import * as fs from "fs";
import type { RawRecord, RawValue } from "@/lib/domain/types";
import type { SourceAdapter } from "./SourceAdapter";

function toRawValue(value: unknown): RawValue {
  if (value == null) return null;
  if (typeof value === "string" || typeof value === "number") return value;
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  return undefined;
}

/**
 * Keep the string, number and string-list values of an extracted object.
 * Anything else (booleans, nested objects) is not a listing field.
 */
export function toRawRecord(item: unknown): RawRecord | null {
  if (item === null || typeof item !== "object" || Array.isArray(item)) return null;
  const record: RawRecord = {};
  for (const [key, value] of Object.entries(item)) {
    const raw = toRawValue(value);
    if (raw !== undefined) record[key] = raw;
  }
  return record;
}

/**
 * Reads an extraction JSON file: an array of objects, one per listing.
 */
export function jsonFileAdapter(filePath: string): SourceAdapter {
  return {
    name: `json:${filePath}`,

    async extract(): Promise<RawRecord[]> {
      const content = fs.readFileSync(filePath, "utf-8");
      const data: unknown = JSON.parse(content);
      if (!Array.isArray(data)) {
        throw new Error(`Expected a JSON array of listings in ${filePath}`);
      }

      const records: RawRecord[] = [];
      data.forEach((item, i) => {
        const record = toRawRecord(item);
        if (record) {
          records.push(record);
        } else {
          console.warn(`[adapter] ${filePath}: skipping entry ${i}, not an object`);
        }
      });
      return records;
    },
  };
}
