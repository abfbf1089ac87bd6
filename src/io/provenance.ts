import { JsonObject } from "../types/json";
import { ResponseProvenance } from "../types/provenance";

export function responseSummary(resp: ResponseProvenance): JsonObject {
  return {
    id: resp.id,
    request_id: resp.requestId,
    kind: resp.kind,
    url: resp.url,
    path: resp.path,
    checksum: resp.checksum,
    created_at: resp.createdAt,
    size_bytes: resp.sizeBytes,
    content_type: resp.contentType,
    status: resp.status,
    cache_mode: resp.cacheMode,
    ttl_seconds: resp.ttlSeconds,
    as_of_bucket: resp.asOfBucket
  };
}

export function recordSidecar(id: string, bucket: string, resp: ResponseProvenance): JsonObject {
  return {
    id,
    kind: "record",
    bucket,
    response: responseSummary(resp)
  };
}

export function indexSidecar(bucket: string, resp: ResponseProvenance): JsonObject {
  return {
    kind: "index",
    bucket,
    response: responseSummary(resp)
  };
}
