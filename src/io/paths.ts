import path from "path";
import { ValidationError } from "../utils/errors";

export const LATEST_LINK = "latest";
export const LATEST_MARKER = "LATEST_BUCKET";
export const RUNS_DIR = "runs";

export const RECORD_FILE = "record.parsed.json";
export const RECORD_RESPONSE_FILE = "record.response.json";
export const AGGREGATE_FILE = "aggregate.parsed.json";
export const INDEX_RESPONSE_FILE = "index.response.json";

export const PROGRESS_FILE = "progress.jsonl";
export const RUN_SUMMARY_FILE = "run.json";

/** Root-level entries that live beside bucket directories but are not buckets. */
export const RESERVED_ROOT_ENTRIES: ReadonlySet<string> = new Set([LATEST_LINK, RUNS_DIR]);

/**
 * Encodes an identifier as a single path segment. ISIN-like ids pass through
 * unchanged; separators and other unsafe characters are percent-encoded, and
 * so are the dots of the `.` and `..` ids.
 */
export function entitySegment(id: string): string {
  if (id === "." || id === "..") {
    return id.replace(/\./g, "%2E");
  }
  return encodeURIComponent(id);
}

export function bucketDir(root: string, bucket: string): string {
  if (
    !bucket ||
    bucket === "." ||
    bucket === ".." ||
    bucket !== bucket.trim() ||
    bucket.includes("/") ||
    bucket.includes("\\") ||
    RESERVED_ROOT_ENTRIES.has(bucket)
  ) {
    throw new ValidationError(`Invalid bucket name: '${bucket}'`);
  }
  return path.join(root, bucket);
}

export function entityDir(root: string, bucket: string, id: string): string {
  return path.join(bucketDir(root, bucket), entitySegment(id));
}

export function recordPath(root: string, bucket: string, id: string): string {
  return path.join(entityDir(root, bucket, id), RECORD_FILE);
}

export function recordResponsePath(root: string, bucket: string, id: string): string {
  return path.join(entityDir(root, bucket, id), RECORD_RESPONSE_FILE);
}

export function aggregatePath(root: string, bucket: string): string {
  return path.join(bucketDir(root, bucket), AGGREGATE_FILE);
}

export function indexResponsePath(root: string, bucket: string): string {
  return path.join(bucketDir(root, bucket), INDEX_RESPONSE_FILE);
}

export function runsRoot(basePath: string, namespace: string): string {
  return path.join(basePath, namespace, RUNS_DIR);
}

export function runDir(basePath: string, namespace: string, runId: string): string {
  return path.join(runsRoot(basePath, namespace), runId);
}
