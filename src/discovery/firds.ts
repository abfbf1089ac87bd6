import { z } from "zod";
import { FetchImpl, requestWithBackoff } from "../fetch/retry";
import { saveIndex } from "../io/snapshots";
import { FirdsFileEntry } from "../types/record";
import { ParseError, ValidationError } from "../utils/errors";

export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_SORT = "publication_date:desc";
export const ETF_FILE_TYPE = "FULINS";
export const ETF_FILE_WILDCARD = "FULINS_C_*";

const HitSchema = z.object({
  _source: z
    .object({
      file_type: z.unknown().optional(),
      file_name: z.unknown().optional(),
      publication_date: z.unknown().optional(),
      download_link: z.unknown().optional()
    })
    .passthrough()
    .optional()
});

const SearchResponseSchema = z.object({
  hits: z
    .object({
      total: z.union([z.number(), z.object({ value: z.number() })]).optional(),
      hits: z.array(HitSchema).default([])
    })
    .default({})
});

type SearchResponse = z.infer<typeof SearchResponseSchema>;

export interface FirdsClientOptions {
  apiUrl: string;
  userAgent: string;
  timeoutMs?: number;
  maxTries?: number;
  fetchImpl?: FetchImpl;
  wait?: (ms: number) => Promise<void>;
}

export interface DiscoverFilesParams {
  fileType: string;
  startDate: string;
  endDate: string;
  fileNameWildcard?: string | null;
  pageSize?: number;
  sort?: string;
}

export function buildFirdsQuery(
  fileType: string,
  startDate: string,
  endDate: string,
  fileNameWildcard?: string | null
): string {
  const clauses = [`(file_type:${fileType})`, `(publication_date:[${startDate} TO ${endDate}])`];
  if (fileNameWildcard) clauses.push(`(file_name:${fileNameWildcard})`);
  return `(${clauses.join(" AND ")})`;
}

function totalHits(data: SearchResponse): number | null {
  const total = data.hits.total;
  if (total === undefined) return null;
  return typeof total === "number" ? total : total.value;
}

/** Hits missing any of the four file fields are dropped. */
function toFileEntries(data: SearchResponse): FirdsFileEntry[] {
  const files: FirdsFileEntry[] = [];
  for (const hit of data.hits.hits) {
    const source = hit._source;
    if (
      !source ||
      source.file_type == null ||
      source.file_name == null ||
      source.publication_date == null ||
      source.download_link == null
    ) {
      continue;
    }
    const fileName = String(source.file_name);
    files.push({
      id: fileName,
      url: String(source.download_link),
      file_type: String(source.file_type),
      file_name: fileName,
      publication_date: String(source.publication_date).slice(0, 10)
    });
  }
  return files;
}

export class FirdsClient {
  constructor(private readonly options: FirdsClientOptions) {}

  private async search(params: Record<string, string>): Promise<SearchResponse> {
    const url = new URL(this.options.apiUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    const res = await requestWithBackoff(
      url.toString(),
      { headers: { "User-Agent": this.options.userAgent, Accept: "application/json" } },
      {
        maxTries: this.options.maxTries,
        timeoutMs: this.options.timeoutMs,
        fetchImpl: this.options.fetchImpl,
        wait: this.options.wait
      }
    );

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new ParseError(`FIRDS response from ${url.toString()} is not JSON: ${String(error)}`);
    }
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Unexpected FIRDS response shape: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /** All files matching the query, paging with `from`/`size` until a short page or the reported total. */
  async discoverFiles(params: DiscoverFilesParams): Promise<FirdsFileEntry[]> {
    const pageSize = params.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new ValidationError(`pageSize must be a positive integer, got ${pageSize}`);
    }
    const q = buildFirdsQuery(params.fileType, params.startDate, params.endDate, params.fileNameWildcard);

    const files: FirdsFileEntry[] = [];
    let from = 0;
    for (;;) {
      const data = await this.search({
        q,
        from: String(from),
        size: String(pageSize),
        pretty: "true",
        sort: params.sort ?? DEFAULT_SORT
      });
      files.push(...toFileEntries(data));

      const pageHits = data.hits.hits.length;
      from += pageHits;
      const total = totalHits(data);
      if (pageHits < pageSize || (total !== null && from >= total)) break;
    }
    return files;
  }

  async discoverLatestPublicationDate(fileType = ETF_FILE_TYPE): Promise<string | null> {
    const data = await this.search({
      q: `(file_type:${fileType})`,
      from: "0",
      size: "1",
      pretty: "true",
      sort: DEFAULT_SORT
    });
    const date = data.hits.hits[0]?._source?.publication_date;
    return date == null ? null : String(date).slice(0, 10);
  }

  /** FULINS "C" files (the class that carries ETFs) from the latest publication date. */
  async discoverLatestEtfFiles(): Promise<FirdsFileEntry[]> {
    const publicationDate = await this.discoverLatestPublicationDate(ETF_FILE_TYPE);
    if (!publicationDate) return [];
    return this.discoverFiles({
      fileType: ETF_FILE_TYPE,
      startDate: publicationDate,
      endDate: publicationDate,
      fileNameWildcard: ETF_FILE_WILDCARD
    });
  }
}

/**
 * Stores a file listing as an index snapshot. The bucket is the latest
 * publication date among the files unless one is given.
 */
export async function saveFirdsIndex(
  files: readonly FirdsFileEntry[],
  root: string,
  options: { bucket?: string | null; writeLatest?: boolean } = {}
): Promise<string> {
  const latestPublication = files.map((file) => file.publication_date).sort().pop();
  const bucket = options.bucket || latestPublication;
  if (!bucket) {
    throw new ValidationError("Cannot bucket an empty FIRDS listing without an explicit bucket");
  }
  return saveIndex(files, root, { bucket, writeLatest: options.writeLatest ?? true });
}
