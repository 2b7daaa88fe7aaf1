export interface WorkerArgs {
  site?: string;
  input?: string;
  html?: string;
  dryRun: boolean;
  concurrency?: number;
  list: boolean;
}

/** Parse CLI args */
export function parseArgs(argv: string[]): WorkerArgs {
  const result: WorkerArgs = { dryRun: false, list: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--site" && argv[i + 1]) {
      result.site = argv[++i];
    } else if (arg === "--input" && argv[i + 1]) {
      result.input = argv[++i];
    } else if (arg === "--html" && argv[i + 1]) {
      result.html = argv[++i];
    } else if (arg === "--concurrency" && argv[i + 1]) {
      const n = parseInt(argv[++i], 10);
      if (isNaN(n) || n < 1) throw new Error(`Invalid --concurrency: ${argv[i]}`);
      result.concurrency = n;
    } else if (arg === "--dry-run") {
      result.dryRun = true;
    } else if (arg === "--list") {
      result.list = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return result;
}
