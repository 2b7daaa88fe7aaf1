import * as fs from "fs";
import * as path from "path";
import { createSiteConfig, type SiteConfig } from "@/lib/domain/siteConfig";

export interface SiteSummary {
  name: string;
  enabled: boolean;
  siteOrigin: string;
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

function field(data: unknown, key: string): unknown {
  if (data === null || typeof data !== "object") return undefined;
  return Object.entries(data).find(([k]) => k === key)?.[1];
}

/**
 * List the site configs in a directory without fully validating them.
 * Files that can't be parsed are skipped.
 */
export function listSites(sitesDir: string): SiteSummary[] {
  if (!fs.existsSync(sitesDir)) return [];

  const sites: SiteSummary[] = [];
  for (const file of fs.readdirSync(sitesDir).filter((f) => f.endsWith(".json")).sort()) {
    let data: unknown;
    try {
      data = readJson(path.join(sitesDir, file));
    } catch (err) {
      console.warn(`[sites] Skipping ${file}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }
    const name = field(data, "name");
    const enabled = field(data, "enabled");
    const origin = field(data, "siteOrigin");
    sites.push({
      name: typeof name === "string" ? name : path.basename(file, ".json"),
      enabled: enabled !== false,
      siteOrigin: typeof origin === "string" ? origin : "",
    });
  }
  return sites;
}

/**
 * Load and validate `<sitesDir>/<name>.json`.
 * Unknown and disabled sites are refused.
 */
export function loadSiteConfig(name: string, sitesDir: string): SiteConfig {
  const file = path.join(sitesDir, `${name}.json`);
  if (!fs.existsSync(file)) {
    const available = listSites(sitesDir).map((s) => s.name);
    throw new Error(
      `Site "${name}" not found. Available sites: ${available.join(", ") || "(none)"}`
    );
  }

  const site = createSiteConfig(readJson(file));
  if (!site.enabled) {
    throw new Error(`Site "${name}" is disabled.`);
  }
  return site;
}
