import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import { entitySegment } from "../io/paths";
import { CacheMode, ResponseProvenance } from "../types/provenance";
import { NotFoundError, ParseError } from "../utils/errors";
import { pathExists, readJson, writeBinary, writeJson } from "../utils/fs";
import { sha256 } from "../utils/hash";
import { nowUtcIsoSeconds } from "../utils/time";

const ResponseMetaSchema = z.object({
  id: z.string(),
  request_id: z.string(),
  kind: z.string(),
  url: z.string(),
  checksum: z.string(),
  created_at: z.string(),
  size_bytes: z.number().int().nonnegative(),
  content_type: z.string().nullable(),
  status: z.number().int().nullable(),
  as_of_bucket: z.string(),
  cache_mode: z.enum(["default", "refresh", "offline"]),
  ttl_seconds: z.number().nullable()
});

type ResponseMeta = z.infer<typeof ResponseMetaSchema>;

export interface StoreResponseParams {
  kind: string;
  url: string;
  bucket: string;
  data: Buffer;
  contentType: string | null;
  status: number | null;
  cacheMode: CacheMode;
  ttlSeconds: number | null;
}

function toProvenance(meta: ResponseMeta, bodyPath: string): ResponseProvenance {
  return {
    id: meta.id,
    requestId: meta.request_id,
    kind: meta.kind,
    url: meta.url,
    path: bodyPath,
    checksum: meta.checksum,
    createdAt: meta.created_at,
    sizeBytes: meta.size_bytes,
    contentType: meta.content_type,
    status: meta.status,
    asOfBucket: meta.as_of_bucket,
    cacheMode: meta.cache_mode,
    ttlSeconds: meta.ttl_seconds,
    verify: (data: Buffer) => sha256(data) === meta.checksum
  };
}

/** Reads a stored payload back and checks it against the recorded checksum. */
export async function readPayload(resp: ResponseProvenance): Promise<Buffer> {
  if (!resp.path) {
    throw new Error(`Response ${resp.id} has no payload path`);
  }
  const data = await fs.readFile(resp.path);
  if (resp.checksum && !resp.verify(data)) {
    throw new Error(`Response ${resp.id} checksum mismatch (${resp.path})`);
  }
  return data;
}

/**
 * Raw HTTP payloads keyed by request, grouped per bucket:
 *
 *   <root>/<bucket>/<kind>/<sha256(kind url)>.body
 *   <root>/<bucket>/<kind>/<sha256(kind url)>.meta.json
 */
export class ResponseStore {
  constructor(private readonly root: string) {}

  requestId(kind: string, url: string): string {
    return sha256(`${kind} ${url}`);
  }

  private filePaths(kind: string, url: string, bucket: string): { bodyPath: string; metaPath: string } {
    const dir = path.join(this.root, entitySegment(bucket), entitySegment(kind));
    const key = this.requestId(kind, url);
    return {
      bodyPath: path.join(dir, `${key}.body`),
      metaPath: path.join(dir, `${key}.meta.json`)
    };
  }

  /** A cached response within its TTL, or null on a miss. Unreadable metadata counts as a miss. */
  async lookup(
    kind: string,
    url: string,
    bucket: string,
    ttlSeconds: number | null,
    now = Date.now()
  ): Promise<ResponseProvenance | null> {
    const { bodyPath, metaPath } = this.filePaths(kind, url, bucket);
    if (!(await pathExists(metaPath)) || !(await pathExists(bodyPath))) return null;

    let raw: unknown;
    try {
      raw = await readJson(metaPath);
    } catch (error) {
      // Truncated metadata from an interrupted save.
      if (error instanceof ParseError || error instanceof NotFoundError) return null;
      throw error;
    }
    const parsed = ResponseMetaSchema.safeParse(raw);
    if (!parsed.success) return null;

    const meta = parsed.data;
    if (ttlSeconds !== null) {
      const ageSeconds = (now - Date.parse(meta.created_at)) / 1000;
      if (!(ageSeconds <= ttlSeconds)) return null;
    }
    return toProvenance(meta, bodyPath);
  }

  async save(params: StoreResponseParams): Promise<ResponseProvenance> {
    const { bodyPath, metaPath } = this.filePaths(params.kind, params.url, params.bucket);
    const meta: ResponseMeta = {
      id: randomUUID(),
      request_id: this.requestId(params.kind, params.url),
      kind: params.kind,
      url: params.url,
      checksum: sha256(params.data),
      created_at: nowUtcIsoSeconds(),
      size_bytes: params.data.length,
      content_type: params.contentType,
      status: params.status,
      as_of_bucket: params.bucket,
      cache_mode: params.cacheMode,
      ttl_seconds: params.ttlSeconds
    };

    await writeBinary(bodyPath, params.data);
    await writeJson(metaPath, meta);
    return toProvenance(meta, bodyPath);
  }
}
