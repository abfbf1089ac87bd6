import { cachePolicyFrom, DataPaths, dataPaths, loadSettings } from "../config/settings";
import { Settings } from "../config/settingsSchema";
import { HttpFetcher } from "../fetch/httpFetcher";
import { FetchImpl } from "../fetch/retry";
import { CachePolicy } from "../types/provenance";

export interface CommandContext {
  settings: Settings;
  paths: DataPaths;
  policy: CachePolicy;
  http: HttpFetcher;
}

export interface ContextOptions {
  configPath?: string | null;
  /** Overrides the configured cache bucket for this invocation. */
  bucket?: string | null;
  refresh?: boolean;
  fetchImpl?: FetchImpl;
}

export async function loadCommandContext(options: ContextOptions = {}): Promise<CommandContext> {
  const settings = await loadSettings(options.configPath);
  const paths = dataPaths(settings);
  const configured = cachePolicyFrom(settings);
  const policy: CachePolicy = {
    ...configured,
    cacheMode: options.refresh ? "refresh" : configured.cacheMode,
    asOfBucket: options.bucket || configured.asOfBucket
  };
  const http = new HttpFetcher({
    userAgent: settings.http.user_agent,
    timeoutMs: settings.http.timeout_ms,
    maxTries: settings.http.max_tries,
    responsesDir: paths.responsesRoot,
    policy,
    fetchImpl: options.fetchImpl
  });
  return { settings, paths, policy, http };
}
