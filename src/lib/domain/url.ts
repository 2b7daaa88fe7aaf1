/**
 * URL canonicalization and identity-key derivation for listing URLs.
 */
import type { CanonicalizeResult } from "./types";

const ABSOLUTE_URL = /^https?:\/\//i;

/** Query parameters that only carry campaign/click tracking */
const TRACKING_PARAMS = new Set([
  "gclid",
  "dclid",
  "fbclid",
  "msclkid",
  "yclid",
  "mc_cid",
  "mc_eid",
  "_ga",
  "_gl",
  "_hsenc",
  "_hsmi",
]);

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith("utm_") || TRACKING_PARAMS.has(lower);
}

function decodeParamName(name: string): string {
  try {
    return decodeURIComponent(name.replace(/\+/g, " "));
  } catch {
    return name;
  }
}

function parseHttpUrl(value: string, base?: string): URL | null {
  let url: URL;
  try {
    url = base === undefined ? new URL(value) : new URL(value, base);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  if (url.hostname.length === 0) return null;
  return url;
}

/**
 * Resolve a scraped URL-ish string into an absolute URL.
 *
 * Absolute http(s) URLs are trusted verbatim apart from the scheme, which is
 * lower-cased. Anything else is resolved against `base` (RFC 3986 §5).
 */
export function canonicalize(
  raw: string | null | undefined,
  base: string
): CanonicalizeResult {
  const value = raw?.trim() ?? "";
  if (value.length === 0) return { ok: false, reason: "MissingURL" };

  if (ABSOLUTE_URL.test(value)) {
    if (!parseHttpUrl(value)) return { ok: false, reason: "UnresolvableURL" };
    const schemeEnd = value.indexOf(":");
    return {
      ok: true,
      url: value.slice(0, schemeEnd).toLowerCase() + value.slice(schemeEnd),
    };
  }

  const resolved = parseHttpUrl(value, base);
  if (!resolved) return { ok: false, reason: "UnresolvableURL" };
  return { ok: true, url: resolved.href };
}

/**
 * Derive the identity key of a listing from its canonical URL:
 * - host lower-cased, path casing kept
 * - tracking query parameters removed (utm_*, gclid, fbclid, ...)
 * - an empty trailing "?" or "#" removed
 */
export function identityKey(canonicalUrl: string): string {
  const url = new URL(canonicalUrl);

  const query = url.search.startsWith("?") ? url.search.slice(1) : url.search;
  const kept = query
    .split("&")
    .filter((pair) => pair.length > 0)
    .filter((pair) => {
      const name = pair.split("=")[0];
      return !isTrackingParam(decodeParamName(name));
    });
  url.search = kept.length > 0 ? `?${kept.join("&")}` : "";

  if (url.hash.length === 0) url.hash = "";

  return url.href;
}
