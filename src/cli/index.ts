#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runProfileIndexCommand } from "../commands/profileIndex";
import { runDownloadCommand } from "../commands/download";
import { runStatusCommand } from "../commands/status";
import { runInspectCommand } from "../commands/inspect";
import { runFirdsCommand } from "../commands/firds";
import { ValidationError } from "../utils/errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.REFSNAP_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseNumberOption(label: string): (value: string) => number {
  return (value) => {
    const n = Number(value);
    if (!Number.isFinite(n)) {
      throw new ValidationError(`${label} must be a number, got '${value}'`);
    }
    return n;
  };
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("refsnap")
  .description("Bucketed reference-data snapshots: ETF profiles and FIRDS file listings")
  .version(pkg.version);

program
  .option("--env-file <path>", "Path to .env file (overrides REFSNAP_ENV_FILE/DOTENV_CONFIG_PATH)", envPath)
  .option("--config <path>", "Settings JSON file (defaults apply when omitted)", process.env.REFSNAP_CONFIG);

function configPath(): string | undefined {
  const value: unknown = program.opts().config;
  return typeof value === "string" && value ? value : undefined;
}

program
  .command("index")
  .description("Load the stored profile index, or build it from the sitemap")
  .option("--bucket <bucket>", "Bucket to read from and write to")
  .option("--refresh", "Rebuild from the sitemap even if an index is stored", false)
  .action(async (opts) => {
    await runProfileIndexCommand({ configPath: configPath(), bucket: opts.bucket, refresh: opts.refresh });
  });

program
  .command("download")
  .description("Fetch, parse and persist ETF profiles as one batch run")
  .option("--ids <id...>", "Only these identifiers from the profile index")
  .option("--subset <path>", "JSON array of {id|isin, url, lastmod?} entries to download")
  .option("--limit <n>", "Take the first n entries", parseNumberOption("--limit"))
  .option("--run-id <id>", "Run ID (default: UTC timestamp, e.g. 2025-10-30T07-59-12Z)")
  .option("--force", "Re-download records that already exist in the bucket", false)
  .option("--rate <seconds>", "Pause after each successful fetch", parseNumberOption("--rate"))
  .option("--bucket <bucket>", "Write every record and the aggregate to this bucket")
  .action(async (opts) => {
    await runDownloadCommand({
      configPath: configPath(),
      ids: opts.ids,
      subsetPath: opts.subset,
      limit: opts.limit,
      runId: opts.runId,
      force: opts.force,
      rateSeconds: opts.rate,
      bucket: opts.bucket
    });
  });

program
  .command("status")
  .description("Summarize a batch run (the latest by default)")
  .option("--run <id>", "Run ID to report on")
  .option("--samples <n>", "Number of error samples to show", parseNumberOption("--samples"), 5)
  .action(async (opts) => {
    await runStatusCommand({ configPath: configPath(), runId: opts.run, samples: opts.samples });
  });

program
  .command("inspect")
  .description("List or print stored profile records")
  .option("--bucket <bucket>", "Bucket to read (default: latest)")
  .option("--list", "List identifiers in the bucket aggregate", false)
  .option("--buckets", "List bucket directories", false)
  .option("--id <id>", "Print one record")
  .action(async (opts) => {
    await runInspectCommand({
      configPath: configPath(),
      bucket: opts.bucket,
      list: opts.list,
      buckets: opts.buckets,
      id: opts.id
    });
  });

program
  .command("firds")
  .description("Discover FIRDS files for a publication date and store the listing")
  .option("--file-type <type>", "FULINS, DLTINS or FULCAN", "FULINS")
  .option("--date <date>", "Publication date YYYY-MM-DD (default: latest)")
  .option("--wildcard <pattern>", "file_name filter (default FULINS_C_* for FULINS)")
  .action(async (opts) => {
    await runFirdsCommand({
      configPath: configPath(),
      fileType: opts.fileType,
      date: opts.date,
      wildcard: opts.wildcard
    });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
