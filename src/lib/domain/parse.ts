/**
 * Value parsers for scraped listing fields. All of them return null instead of
 * throwing when the input can't be read.
 */
import type { RawValue } from "./types";

export type MoneyFormat = "usd" | "brl";

function firstScalar(value: RawValue): string | number | null {
  if (value == null) return null;
  if (Array.isArray(value)) return value.length > 0 ? value[0] : null;
  return value;
}

/**
 * Extract trimmed text. Numbers are stringified; empty strings become null.
 */
export function parseTextValue(value: RawValue): string | null {
  const scalar = firstScalar(value);
  if (scalar == null) return null;
  if (typeof scalar === "number") {
    return Number.isFinite(scalar) ? String(scalar) : null;
  }
  const text = scalar.replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
}

/**
 * Trimmed text with inner whitespace left as is, for values such as URLs that
 * must be kept verbatim.
 */
export function parseVerbatimText(value: RawValue): string | null {
  const scalar = firstScalar(value);
  if (scalar == null) return null;
  if (typeof scalar === "number") {
    return Number.isFinite(scalar) ? String(scalar) : null;
  }
  const text = scalar.trim();
  return text.length > 0 ? text : null;
}

/**
 * Parse a number from text like "2", "1.5" or "72,5 m²". Returns null if unparseable.
 */
export function parseNumber(value: RawValue): number | null {
  const scalar = firstScalar(value);
  if (scalar == null) return null;
  if (typeof scalar === "number") return Number.isFinite(scalar) ? scalar : null;

  let str = scalar.trim();
  if (!str.includes(".")) str = str.replace(",", ".");
  const match = str.match(/-?\d+(\.\d+)?/);
  if (!match) return null;
  const num = parseFloat(match[0]);
  return isNaN(num) ? null : num;
}

/**
 * Parse an integer count (bedrooms, parking spaces). Fractions are truncated.
 */
export function parseInteger(value: RawValue): number | null {
  const num = parseNumber(value);
  return num === null ? null : Math.trunc(num);
}

/**
 * "1.234,56" uses a decimal comma. Without a comma, a single dot followed by
 * one or two digits ("2500.00") is a decimal point; other dots group thousands.
 */
function brlDigits(text: string): string {
  if (text.includes(",")) return text.replace(/\./g, "").replace(",", ".");
  if (/^\d+\.\d{1,2}$/.test(text)) return text;
  return text.replace(/\./g, "");
}

/**
 * Parse a money string into a plain number.
 *
 * usd: "$3,500" or "$3,500/mo" -> 3500
 * brl: "R$ 1.234,56" -> 1234.56
 */
export function parseMoney(value: RawValue, format: MoneyFormat): number | null {
  const scalar = firstScalar(value);
  if (scalar == null) return null;
  if (typeof scalar === "number") return Number.isFinite(scalar) ? scalar : null;

  const match = scalar.match(/\d[\d.,]*/);
  if (!match) return null;

  const digits = format === "brl" ? brlDigits(match[0]) : match[0].replace(/,/g, "");
  const amount = parseFloat(digits);
  return isNaN(amount) ? null : amount;
}

/**
 * Collect the string entries of a scalar-or-list value. A single string is a
 * one-entry list.
 */
export function parseStringList(value: RawValue): string[] {
  if (value == null) return [];
  if (Array.isArray(value)) return value.filter((v) => typeof v === "string");
  return typeof value === "string" ? [value] : [];
}
