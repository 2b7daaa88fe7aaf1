/**
 * Record normalization: one raw extracted record + its SiteConfig in, one
 * canonical record (or a rejection) out. Pure; safe to run concurrently.
 */
import type { FieldRule, SiteConfig } from "./siteConfig";
import type {
  FieldValue,
  FieldWarning,
  ListingFields,
  NormalizeResult,
  RawRecord,
  RawValue,
} from "./types";
import {
  parseInteger,
  parseMoney,
  parseNumber,
  parseStringList,
  parseTextValue,
  parseVerbatimText,
} from "./parse";
import { canonicalize, identityKey } from "./url";

function parseScalarField(rule: FieldRule, value: RawValue): FieldValue | null {
  switch (rule.type) {
    case "text":
      return parseTextValue(value);
    case "integer":
      return parseInteger(value);
    case "float":
      return parseNumber(value);
    case "money_usd":
      return parseMoney(value, "usd");
    case "money_brl":
      return parseMoney(value, "brl");
    case "url":
    case "url_list":
      return null;
  }
}

/**
 * Canonicalize every entry of a URL list, dropping failures and repeats.
 */
function normalizeUrlList(
  rule: FieldRule,
  value: RawValue,
  base: string,
  warnings: FieldWarning[]
): string[] {
  const urls: string[] = [];
  for (const entry of parseStringList(value)) {
    const result = canonicalize(entry, base);
    if (!result.ok) {
      // blank entries are list padding, not broken links
      if (result.reason !== "MissingURL") {
        warnings.push({ field: rule.name, value: entry, reason: result.reason });
      }
      continue;
    }
    if (!urls.includes(result.url)) urls.push(result.url);
  }
  return urls;
}

function applyComputed(config: SiteConfig, fields: ListingFields): void {
  for (const computed of config.computed) {
    const [first, ...rest] = computed.sum;
    const head = fields[first];
    if (typeof head !== "number") continue;

    let total = head;
    for (const operand of rest) {
      const value = fields[operand];
      if (typeof value === "number") total += value;
    }
    fields[computed.name] = total;
  }
}

/**
 * Normalize one raw record.
 *
 * The primary URL is mandatory: if it can't be canonicalized the whole record
 * is rejected with InvalidPrimaryURL. Secondary URL failures only drop the
 * field, and unparsable scalar values are left out of the record.
 */
export function normalizeRecord(
  raw: RawRecord,
  config: SiteConfig,
  index = 0
): NormalizeResult {
  const base = config.baseUrl;
  const fields: ListingFields = {};
  const warnings: FieldWarning[] = [];
  let primaryUrl: string | null = null;

  for (const rule of config.fields) {
    const value = raw[rule.source];

    if (rule.type === "url") {
      const text = parseVerbatimText(value);
      const result = canonicalize(text, base);

      if (rule.name === config.primaryUrlField) {
        if (!result.ok) {
          return {
            ok: false,
            rejection: { reason: "InvalidPrimaryURL", cause: result.reason, index, raw },
          };
        }
        primaryUrl = result.url;
      }

      if (result.ok) {
        fields[rule.name] = result.url;
      } else if (text !== null) {
        warnings.push({ field: rule.name, value: text, reason: result.reason });
      }
      continue;
    }

    if (rule.type === "url_list") {
      const urls = normalizeUrlList(rule, value, base, warnings);
      if (urls.length > 0) fields[rule.name] = urls;
      continue;
    }

    const parsed = parseScalarField(rule, value);
    if (parsed !== null) fields[rule.name] = parsed;
  }

  if (primaryUrl === null) {
    // only reachable with a config that has no primary url rule
    return {
      ok: false,
      rejection: { reason: "InvalidPrimaryURL", cause: "MissingURL", index, raw },
    };
  }

  applyComputed(config, fields);

  return {
    ok: true,
    record: {
      identityKey: identityKey(primaryUrl),
      source: config.name,
      url: primaryUrl,
      fields,
    },
    warnings,
  };
}

/**
 * Normalize a whole batch, keeping input order and indexes.
 */
export function normalizeBatch(
  raws: RawRecord[],
  config: SiteConfig
): NormalizeResult[] {
  return raws.map((raw, i) => normalizeRecord(raw, config, i));
}
