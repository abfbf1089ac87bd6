import { z } from "zod";
import { HttpFetcher } from "../fetch/httpFetcher";
import { loadIndex, saveIndex } from "../io/snapshots";
import { IndexEntry, isIndexEntry } from "../types/record";
import { NotFoundError, ParseError, ValidationError } from "../utils/errors";
import { readJson } from "../utils/fs";
import { todayIsoDate } from "../utils/time";
import { buildProfileIndex } from "./sitemap";

export type IndexLogger = Pick<Console, "info">;

export interface ProfileIndexOptions {
  root: string;
  http: HttpFetcher;
  sitemapUrl: string;
  bucket?: string | null;
  forceRefresh?: boolean;
  writeLatest?: boolean;
  logger?: IndexLogger;
}

export async function loadProfileIndex(root: string, bucket?: string | null): Promise<IndexEntry[]> {
  const records = await loadIndex(root, { bucket });
  return records.map((record, index) => {
    if (!isIndexEntry(record)) {
      throw new ParseError(`Index entry #${index} under ${root} has no 'url'`, root);
    }
    return record;
  });
}

/**
 * Stored index when there is one (unless forced), otherwise a fresh sitemap
 * build persisted as a new index snapshot.
 */
export async function getProfileIndex(options: ProfileIndexOptions): Promise<IndexEntry[]> {
  const logger = options.logger ?? console;

  if (!options.forceRefresh) {
    try {
      const entries = await loadProfileIndex(options.root, options.bucket);
      logger.info(`[index] loaded ${entries.length} entries from ${options.root}`);
      return entries;
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      logger.info(`[index] no stored index (${error.message}); building from sitemap`);
    }
  }

  const { entries, provenance } = await buildProfileIndex(options.http, options.sitemapUrl);
  const bucket = provenance?.asOfBucket || options.bucket || todayIsoDate();
  const filePath = await saveIndex(entries, options.root, {
    provenance,
    bucket,
    writeLatest: options.writeLatest ?? true
  });
  logger.info(`[index] saved ${entries.length} entries to ${filePath}`);
  return entries;
}

const SubsetEntrySchema = z
  .object({
    id: z.string().min(1).optional(),
    isin: z.string().min(1).optional(),
    url: z.string().url(),
    lastmod: z.string().optional()
  })
  .refine((entry) => Boolean(entry.id ?? entry.isin), { message: "entry needs 'id' or 'isin'" });

const SubsetSchema = z.array(SubsetEntrySchema);

/** Hand-picked index entries from a JSON array of `{id | isin, url, lastmod?}`. */
export async function loadSubsetFile(filePath: string): Promise<IndexEntry[]> {
  const parsed = SubsetSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ValidationError(`Invalid subset file ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data.map((row) => {
    const id = row.id ?? row.isin ?? "";
    const entry: IndexEntry = { id, url: row.url };
    if (row.isin) entry.isin = row.isin;
    if (row.lastmod !== undefined) entry.lastmod = row.lastmod;
    return entry;
  });
}

/** Entries for the given ids in the order asked; unknown ids raise NotFoundError. */
export function selectEntries(index: readonly IndexEntry[], ids: readonly string[]): IndexEntry[] {
  const byId = new Map(index.map((entry) => [entry.id, entry]));
  return ids.map((id) => {
    const entry = byId.get(id);
    if (!entry) throw new NotFoundError(`Id '${id}' is not in the profile index`, null);
    return entry;
  });
}
