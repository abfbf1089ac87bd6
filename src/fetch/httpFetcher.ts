import { EntityFetcher } from "../batch/orchestrator";
import { CachePolicy, FetchResult } from "../types/provenance";
import { NotFoundError } from "../utils/errors";
import { readPayload, ResponseStore } from "./responseStore";
import { FetchImpl, requestWithBackoff } from "./retry";

export type FetchLogger = Pick<Console, "info">;

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  maxTries: number;
  responsesDir: string;
  policy: CachePolicy;
  fetchImpl?: FetchImpl;
  wait?: (ms: number) => Promise<void>;
  logger?: FetchLogger;
}

export class HttpFetcher {
  readonly store: ResponseStore;
  private readonly logger: FetchLogger;

  constructor(private readonly options: HttpFetcherOptions) {
    this.store = new ResponseStore(options.responsesDir);
    this.logger = options.logger ?? console;
  }

  get policy(): CachePolicy {
    return this.options.policy;
  }

  /**
   * Serves `url` according to the cache policy. Every returned body is read
   * back from the response store, so its provenance always points at a
   * verified payload.
   */
  async get(kind: string, url: string, accept: string): Promise<FetchResult> {
    const { cacheMode, ttlSeconds, asOfBucket } = this.options.policy;

    if (cacheMode !== "refresh") {
      const cached = await this.store.lookup(kind, url, asOfBucket, ttlSeconds);
      if (cached) {
        this.logger.info(`[fetch] cache hit ${kind} ${url}`);
        const data = await readPayload(cached);
        return { body: data.toString("utf8"), provenance: cached };
      }
      if (cacheMode === "offline") {
        throw new NotFoundError(`No cached ${kind} response for ${url} in bucket ${asOfBucket}`, null);
      }
    }

    this.logger.info(`[fetch] GET ${url}`);
    const res = await requestWithBackoff(
      url,
      { headers: { "User-Agent": this.options.userAgent, Accept: accept } },
      {
        maxTries: this.options.maxTries,
        timeoutMs: this.options.timeoutMs,
        fetchImpl: this.options.fetchImpl,
        wait: this.options.wait
      }
    );
    const data = Buffer.from(await res.arrayBuffer());

    const provenance = await this.store.save({
      kind,
      url,
      bucket: asOfBucket,
      data,
      contentType: res.headers.get("content-type"),
      status: res.status,
      cacheMode,
      ttlSeconds
    });
    const stored = await readPayload(provenance);
    return { body: stored.toString("utf8"), provenance };
  }
}

export const PROFILE_KIND = "profile_html";

export function profileFetcher(http: HttpFetcher): EntityFetcher {
  return (_id, url) => http.get(PROFILE_KIND, url, "text/html");
}
