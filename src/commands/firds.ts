import { dataPaths, loadSettings } from "../config/settings";
import { ETF_FILE_TYPE, ETF_FILE_WILDCARD, FirdsClient, saveFirdsIndex } from "../discovery/firds";
import { FetchImpl } from "../fetch/retry";
import { FirdsFileEntry } from "../types/record";

export interface FirdsCommandOptions {
  configPath?: string | null;
  fileType?: string;
  /** Publication date (YYYY-MM-DD); the latest one for the file type when absent. */
  date?: string | null;
  wildcard?: string | null;
  fetchImpl?: FetchImpl;
}

export async function runFirdsCommand(options: FirdsCommandOptions): Promise<void> {
  const settings = await loadSettings(options.configPath);
  const client = new FirdsClient({
    apiUrl: settings.sources.firds_api_url,
    userAgent: settings.http.user_agent,
    timeoutMs: settings.http.timeout_ms,
    maxTries: settings.http.max_tries,
    fetchImpl: options.fetchImpl
  });

  const fileType = options.fileType ?? ETF_FILE_TYPE;
  const date = options.date || (await client.discoverLatestPublicationDate(fileType));
  if (!date) {
    console.log(`[firds] no ${fileType} publications found`);
    return;
  }

  const wildcard = options.wildcard ?? (fileType === ETF_FILE_TYPE ? ETF_FILE_WILDCARD : null);
  const files: FirdsFileEntry[] = await client.discoverFiles({
    fileType,
    startDate: date,
    endDate: date,
    fileNameWildcard: wildcard
  });
  console.log(`[firds] ${files.length} ${fileType} files published ${date}`);
  if (!files.length) return;

  const filePath = await saveFirdsIndex(files, dataPaths(settings).firdsIndexRoot, {
    bucket: date,
    writeLatest: settings.batch.write_latest
  });
  for (const file of files) {
    console.log(`- ${file.file_name}  ${file.url}`);
  }
  console.log(`[firds] index written to ${filePath}`);
}
