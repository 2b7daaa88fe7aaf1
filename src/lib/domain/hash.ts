import { createHash } from "crypto";
import type { ListingFields } from "./types";

/**
 * Produce a stable SHA-256 hex hash of the input string.
 */
export function hashString(str: string): string {
  return createHash("sha256").update(str).digest("hex");
}

/**
 * JSON with object keys sorted, so that field order coming out of extraction
 * never changes the hash.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

/** Content hash over every non-key field of a listing. */
export function contentHash(fields: ListingFields): string {
  return hashString(stableStringify(fields));
}
