export type CacheMode = "default" | "refresh" | "offline";

/** How a fetched payload was obtained; written beside parsed artifacts as a sidecar. */
export interface ResponseProvenance {
  id: string;
  requestId: string;
  kind: string;
  url: string;
  /** Stored payload file, when the payload was persisted. */
  path: string | null;
  /** sha256 hex of the payload. */
  checksum: string | null;
  createdAt: string;
  sizeBytes: number;
  contentType: string | null;
  status: number | null;
  /** Bucket the response was cached under; preferred when choosing where to persist. */
  asOfBucket: string | null;
  cacheMode: CacheMode;
  ttlSeconds: number | null;
  verify(data: Buffer): boolean;
}

export interface FetchResult {
  body: string;
  provenance: ResponseProvenance | null;
}

export interface CachePolicy {
  cacheMode: CacheMode;
  ttlSeconds: number | null;
  /** Resolved bucket that fetched responses are cached under. */
  asOfBucket: string;
}
