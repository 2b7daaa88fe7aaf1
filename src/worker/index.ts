import "dotenv/config";
import { ConfigError, StoreUnavailableError } from "@/lib/domain/errors";
import { getPool } from "@/lib/db";
import { InMemoryStore } from "@/lib/store/memoryStore";
import { PostgresStore } from "@/lib/store/postgresStore";
import type { StoreAdapter } from "@/lib/store/StoreAdapter";
import { htmlImportAdapter } from "./adapters/htmlImport";
import { jsonFileAdapter } from "./adapters/jsonFile";
import type { SourceAdapter } from "./adapters/SourceAdapter";
import { parseArgs } from "./args";
import { loadEnv } from "./config";
import { ingestAdapter } from "./pipeline/ingest";
import { listSites, loadSiteConfig } from "./sites";

const USAGE =
  "Usage: worker --site <name> (--input <file.json> | --html <dir>) [--dry-run] [--concurrency <n>]\n" +
  "       worker --list";

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const env = loadEnv();

  if (args.list) {
    for (const site of listSites(env.SITES_DIR)) {
      console.log(`${site.enabled ? "+" : "-"} ${site.name}  ${site.siteOrigin}`);
    }
    return 0;
  }

  if (!args.site || (!args.input && !args.html) || (args.input && args.html)) {
    console.error(USAGE);
    return 1;
  }

  const site = loadSiteConfig(args.site, env.SITES_DIR);
  const adapter: SourceAdapter = args.input
    ? jsonFileAdapter(args.input)
    : htmlImportAdapter(args.html ?? "", site);

  console.log("=== Listing Sync Worker Starting ===");
  console.log(`Site: ${site.name} (base ${site.baseUrl})${args.dryRun ? " [dry run]" : ""}`);

  let store: StoreAdapter;
  if (args.dryRun) {
    store = new InMemoryStore();
  } else {
    const pgStore = new PostgresStore(getPool(env.DATABASE_URL));
    await pgStore.migrate();
    store = pgStore;
  }

  try {
    await ingestAdapter(adapter, site, store, {
      concurrency: args.concurrency ?? env.SYNC_CONCURRENCY,
    });
  } finally {
    if (!args.dryRun) await getPool(env.DATABASE_URL).end();
  }

  console.log("\n=== Listing Sync Worker Complete ===");
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof StoreUnavailableError) {
      console.error(`[worker] ${err.message}`);
      console.error(`[worker] Not yet synced: ${err.pendingKeys.join(", ")}`);
    } else if (err instanceof ConfigError) {
      console.error(`[worker] ${err.message}`);
    } else {
      console.error("Worker failed:", err);
    }
    process.exit(1);
  });
