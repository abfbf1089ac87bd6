import { getProfileIndex } from "../discovery/profileIndex";
import { loadCommandContext } from "./context";

export interface ProfileIndexCommandOptions {
  configPath?: string | null;
  bucket?: string | null;
  refresh?: boolean;
}

export async function runProfileIndexCommand(options: ProfileIndexCommandOptions): Promise<void> {
  const { settings, paths, http } = await loadCommandContext(options);
  const entries = await getProfileIndex({
    root: paths.profileIndexRoot,
    http,
    sitemapUrl: settings.sources.sitemap_url,
    bucket: options.bucket,
    forceRefresh: options.refresh,
    writeLatest: settings.batch.write_latest
  });
  console.log(`Profile index holds ${entries.length} entries (${paths.profileIndexRoot}).`);
}
