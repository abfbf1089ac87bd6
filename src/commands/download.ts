import { runBatch } from "../batch/orchestrator";
import { getProfileIndex, loadSubsetFile, selectEntries } from "../discovery/profileIndex";
import { profileFetcher } from "../fetch/httpFetcher";
import { parseProfile } from "../parse/profileParser";
import { IndexEntry } from "../types/record";
import { ValidationError } from "../utils/errors";
import { loadCommandContext } from "./context";

export interface DownloadCommandOptions {
  configPath?: string | null;
  ids?: string[];
  subsetPath?: string | null;
  limit?: number | null;
  runId?: string | null;
  force?: boolean;
  rateSeconds?: number | null;
  bucket?: string | null;
}

export async function runDownloadCommand(options: DownloadCommandOptions): Promise<void> {
  if (options.limit != null && (!Number.isInteger(options.limit) || options.limit <= 0)) {
    throw new ValidationError(`--limit must be a positive integer, got ${options.limit}`);
  }
  const { settings, paths, http } = await loadCommandContext({
    configPath: options.configPath,
    bucket: options.bucket
  });

  const loadIndex = (): Promise<IndexEntry[]> =>
    getProfileIndex({
      root: paths.profileIndexRoot,
      http,
      sitemapUrl: settings.sources.sitemap_url,
      writeLatest: settings.batch.write_latest
    });

  let entries: IndexEntry[] | null = null;
  if (options.subsetPath) {
    entries = await loadSubsetFile(options.subsetPath);
  } else if (options.ids?.length) {
    entries = selectEntries(await loadIndex(), options.ids);
  } else if (options.limit != null) {
    entries = await loadIndex();
  }
  if (entries && options.limit != null) {
    entries = entries.slice(0, options.limit);
  }

  const result = await runBatch({
    basePath: paths.dataRoot,
    namespace: settings.profiles_dir,
    entries,
    loadEntries: loadIndex,
    fetchEntity: profileFetcher(http),
    parse: (html, id) => parseProfile(html, id),
    rateSeconds: options.rateSeconds ?? settings.batch.rate_seconds,
    forceRefresh: options.force,
    runId: options.runId,
    bucket: options.bucket,
    writeLatest: settings.batch.write_latest
  });

  console.log(`Run ${result.runId}: ok=${result.counts.ok} skip=${result.counts.skip} err=${result.counts.err}`);
  console.log(`Aggregate written to ${result.aggregatePath}`);
}
