import { Dirent, promises as fs } from "fs";
import { JsonObject, JsonValue } from "../types/json";
import { ResponseProvenance } from "../types/provenance";
import { EntityRecord, isEntityRecord, recordId } from "../types/record";
import { hasErrnoCode, NotFoundError, ParseError, ValidationError } from "../utils/errors";
import { pathExists, readJson, writeJson } from "../utils/fs";
import { todayIsoDate } from "../utils/time";
import { resolveLatestBucket, updateLatestPointer } from "./latestPointer";
import {
  aggregatePath,
  indexResponsePath,
  recordPath,
  recordResponsePath,
  RESERVED_ROOT_ENTRIES
} from "./paths";
import { indexSidecar, recordSidecar } from "./provenance";

/*
 * Bucketed layout, per artifact root (profiles/, profile_index/, ...):
 *
 *   <root>/<bucket>/<id>/record.parsed.json
 *   <root>/<bucket>/<id>/record.response.json     provenance, optional
 *   <root>/<bucket>/aggregate.parsed.json
 *   <root>/<bucket>/index.response.json           provenance, optional
 *   <root>/latest -> <bucket>
 *
 * A write only ever touches its own bucket plus the root-level pointer.
 */

export interface SnapshotWriteOptions {
  provenance?: ResponseProvenance | null;
  bucket?: string | null;
  writeLatest?: boolean;
}

export interface SnapshotReadOptions {
  bucket?: string | null;
}

export interface RecordReadOptions extends SnapshotReadOptions {
  id: string;
}

/** Write bucket: provenance hint, then the explicit bucket, then today. */
export function resolveWriteBucket(options: SnapshotWriteOptions): string {
  return options.provenance?.asOfBucket || options.bucket || todayIsoDate();
}

function requireRecordId(record: JsonObject, label = "Record"): string {
  const id = recordId(record);
  if (id === null) {
    throw new ValidationError(`${label} must include a non-empty string 'id'`);
  }
  return id;
}

function requireRecordIds(records: readonly JsonObject[]): void {
  records.forEach((record, index) => requireRecordId(record, `Record #${index}`));
}

export async function listBuckets(root: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) return [];
    throw error;
  }
  return entries
    .filter((entry) => entry.isDirectory() && !RESERVED_ROOT_ENTRIES.has(entry.name))
    .filter((entry) => !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort();
}

/** Read bucket: explicit, then the latest pointer, then the last bucket on disk. */
export async function resolveReadBucket(root: string, bucket?: string | null): Promise<string> {
  if (bucket) return bucket;
  if (!(await pathExists(root))) {
    throw new NotFoundError(`Snapshot root not found: ${root}`, root);
  }

  const latest = await resolveLatestBucket(root);
  if (latest) return latest;

  const buckets = await listBuckets(root);
  const last = buckets[buckets.length - 1];
  if (last === undefined) {
    throw new NotFoundError(`No buckets found under ${root}`, root);
  }
  return last;
}

function toRecordList(data: JsonValue, filePath: string): EntityRecord[] {
  if (!Array.isArray(data)) {
    throw new ParseError(`Expected a JSON array of records in ${filePath}`, filePath);
  }
  return data.map((item, index) => {
    if (!isEntityRecord(item)) {
      throw new ParseError(`Entry #${index} in ${filePath} has no 'id'`, filePath);
    }
    return item;
  });
}

async function readAggregate(root: string, bucket?: string | null): Promise<EntityRecord[]> {
  const useBucket = await resolveReadBucket(root, bucket);
  const filePath = aggregatePath(root, useBucket);
  if (!(await pathExists(filePath))) {
    throw new NotFoundError(`No aggregate snapshot in bucket '${useBucket}': ${filePath}`, filePath);
  }
  return toRecordList(await readJson(filePath), filePath);
}

export async function recordExists(root: string, bucket: string, id: string): Promise<boolean> {
  return pathExists(recordPath(root, bucket, id));
}

/**
 * Persists one record (and its provenance sidecar) under the resolved bucket.
 * Returns the path of `record.parsed.json`.
 */
export async function saveRecord(
  record: JsonObject,
  root: string,
  options: SnapshotWriteOptions = {}
): Promise<string> {
  const id = requireRecordId(record);
  const bucket = resolveWriteBucket(options);
  const parsedPath = recordPath(root, bucket, id);

  await writeJson(parsedPath, record);
  if (options.provenance) {
    await writeJson(recordResponsePath(root, bucket, id), recordSidecar(id, bucket, options.provenance));
  }
  if (options.writeLatest ?? true) {
    await updateLatestPointer(root, bucket);
  }
  return parsedPath;
}

export async function loadRecord(root: string, options: RecordReadOptions): Promise<EntityRecord> {
  const bucket = options.bucket || (await resolveLatestBucket(root));
  if (!bucket) {
    throw new NotFoundError(`No bucket given and no 'latest' pointer under ${root}`, root);
  }

  const filePath = recordPath(root, bucket, options.id);
  if (!(await pathExists(filePath))) {
    throw new NotFoundError(`Record '${options.id}' not found in bucket '${bucket}'`, filePath);
  }

  const data = await readJson(filePath);
  if (!isEntityRecord(data)) {
    throw new ParseError(`Record file has no 'id': ${filePath}`, filePath);
  }
  return data;
}

/** Writes the whole list as one array at the bucket root; per-entity files are left alone. */
export async function saveAggregate(
  records: readonly JsonObject[],
  root: string,
  options: SnapshotWriteOptions = {}
): Promise<string> {
  requireRecordIds(records);
  const bucket = resolveWriteBucket(options);
  const filePath = await writeJson(aggregatePath(root, bucket), records);
  if (options.writeLatest ?? true) {
    await updateLatestPointer(root, bucket);
  }
  return filePath;
}

export async function loadAggregate(
  root: string,
  options: SnapshotReadOptions = {}
): Promise<EntityRecord[]> {
  return readAggregate(root, options.bucket);
}

/**
 * Index snapshots never default to today: the bucket must be given or carried
 * by the provenance of the index fetch.
 */
export async function saveIndex(
  records: readonly JsonObject[],
  root: string,
  options: SnapshotWriteOptions = {}
): Promise<string> {
  const bucket = options.bucket || options.provenance?.asOfBucket;
  if (!bucket) {
    throw new ValidationError("Index snapshots need an explicit bucket or provenance carrying one");
  }
  requireRecordIds(records);

  const filePath = await writeJson(aggregatePath(root, bucket), records);
  if (options.provenance) {
    await writeJson(indexResponsePath(root, bucket), indexSidecar(bucket, options.provenance));
  }
  if (options.writeLatest ?? true) {
    await updateLatestPointer(root, bucket);
  }
  return filePath;
}

export async function loadIndex(root: string, options: SnapshotReadOptions = {}): Promise<EntityRecord[]> {
  return readAggregate(root, options.bucket);
}
