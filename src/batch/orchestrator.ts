import path from "path";
import { resolveLatestBucket } from "../io/latestPointer";
import { DEFAULT_RUN_NAMESPACE, RunLog } from "../io/runLog";
import { buildRunSummary } from "../io/runSummary";
import { recordExists, saveAggregate, saveRecord } from "../io/snapshots";
import { JsonObject } from "../types/json";
import { FetchResult } from "../types/provenance";
import { IndexEntry } from "../types/record";
import { RunCounts } from "../types/runLog";
import { errorMessage, isErrnoException, ValidationError } from "../utils/errors";
import { nowUtcIsoSeconds, sleep, todayIsoDate } from "../utils/time";

export type EntityFetcher = (id: string, url: string) => Promise<FetchResult>;
export type EntityParser = (raw: string, id: string) => JsonObject;
export type BatchLogger = Pick<Console, "info" | "warn">;

export const DEFAULT_RATE_SECONDS = 2;

export interface BatchOptions {
  basePath: string;
  /** Pre-supplied entity list; when absent, `loadEntries` is called. */
  entries?: readonly IndexEntry[] | null;
  loadEntries?: () => Promise<readonly IndexEntry[]>;
  fetchEntity: EntityFetcher;
  parse: EntityParser;
  /** Pause after each successful fetch. */
  rateSeconds?: number;
  forceRefresh?: boolean;
  runId?: string | null;
  /** Bucket override; known from the start, so it also enables early skips. */
  bucket?: string | null;
  writeLatest?: boolean;
  namespace?: string;
  logger?: BatchLogger;
  wait?: (ms: number) => Promise<void>;
}

export interface BatchResult {
  runId: string;
  runDir: string;
  bucket: string;
  aggregatePath: string;
  counts: RunCounts;
}

export interface SkipDecision {
  skip: boolean;
  reason: string | null;
}

export type EntryOutcome =
  | { status: "ok"; record: JsonObject; bucket: string }
  | { status: "err"; error: string };

/**
 * Skips only when a bucket is already known for the run, the run is not
 * forcing, and the record already exists in that bucket.
 */
export async function shouldSkip(params: {
  profilesRoot: string;
  bucket: string | null;
  id: string;
  forceRefresh: boolean;
}): Promise<SkipDecision> {
  if (params.forceRefresh || params.bucket === null) {
    return { skip: false, reason: null };
  }
  if (await recordExists(params.profilesRoot, params.bucket, params.id)) {
    return { skip: true, reason: "exists" };
  }
  return { skip: false, reason: null };
}

/**
 * Bucket for the aggregate: override, adopted, latest pointer, today. A
 * pointer the filesystem cannot read counts as no pointer.
 */
export async function resolveRunBucket(params: {
  provided: string | null;
  adopted: string | null;
  profilesRoot: string;
  today?: string;
}): Promise<string> {
  if (params.provided) return params.provided;
  if (params.adopted) return params.adopted;
  const latest = await resolveLatestBucket(params.profilesRoot).catch((error: unknown) => {
    if (isErrnoException(error)) return null;
    throw error;
  });
  if (latest) return latest;
  return params.today ?? todayIsoDate();
}

/** Fetch, parse and persist one entry; failures come back as an outcome, never thrown. */
export async function processOneEntry(params: {
  entry: IndexEntry;
  bucket: string | null;
  profilesRoot: string;
  fetchEntity: EntityFetcher;
  parse: EntityParser;
  writeLatest: boolean;
}): Promise<EntryOutcome> {
  const { entry } = params;
  try {
    const fetched = await params.fetchEntity(entry.id, entry.url);
    const record: JsonObject = { ...params.parse(fetched.body, entry.id), source_url: entry.url };
    const bucket = fetched.provenance?.asOfBucket || params.bucket || todayIsoDate();

    await saveRecord(record, params.profilesRoot, {
      provenance: fetched.provenance,
      bucket,
      writeLatest: params.writeLatest
    });
    return { status: "ok", record, bucket };
  } catch (error) {
    return { status: "err", error: errorMessage(error) };
  }
}

async function acquireEntries(options: BatchOptions): Promise<readonly IndexEntry[]> {
  if (options.entries) return options.entries;
  if (options.loadEntries) return options.loadEntries();
  throw new ValidationError("runBatch needs either 'entries' or 'loadEntries'");
}

/**
 * Drives each entry through fetch -> parse -> persist, strictly one at a time,
 * then writes an aggregate of this run's records. Per-entry failures, from
 * the skip check through the ok and skip ledger lines, are recorded in the
 * run log and never abort the run.
 */
export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  const rateSeconds = options.rateSeconds ?? DEFAULT_RATE_SECONDS;
  if (!Number.isFinite(rateSeconds) || rateSeconds < 0) {
    throw new ValidationError(`rateSeconds must be a non-negative number, got ${rateSeconds}`);
  }
  const namespace = options.namespace ?? DEFAULT_RUN_NAMESPACE;
  const profilesRoot = path.join(options.basePath, namespace);
  const writeLatest = options.writeLatest ?? true;
  const forceRefresh = options.forceRefresh ?? false;
  const logger = options.logger ?? console;
  const wait = options.wait ?? sleep;

  const entries = await acquireEntries(options);
  const runLog = await RunLog.open(options.basePath, { runId: options.runId, namespace });
  const startedAt = nowUtcIsoSeconds();

  let bucket: string | null = options.bucket || null;
  const counts: RunCounts = { ok: 0, skip: 0, err: 0 };
  const runRecords: JsonObject[] = [];

  logger.info(`[batch] run ${runLog.runId}: ${entries.length} entries`);

  for (const entry of entries) {
    let failure: string;
    try {
      const decision = await shouldSkip({ profilesRoot, bucket, id: entry.id, forceRefresh });
      const outcome: EntryOutcome | { status: "skip"; reason: string | null } = decision.skip
        ? { status: "skip", reason: decision.reason }
        : await processOneEntry({
            entry,
            bucket,
            profilesRoot,
            fetchEntity: options.fetchEntity,
            parse: options.parse,
            writeLatest
          });

      if (outcome.status === "skip") {
        await runLog.log(entry.id, "skip", { bucket, reason: outcome.reason });
        counts.skip += 1;
        continue;
      }
      if (outcome.status === "ok") {
        await runLog.log(entry.id, "ok", { bucket: outcome.bucket });
        await runLog.markOk(entry.id);
        // The first fresh result fixes the run's bucket for later skips and the aggregate.
        bucket ??= outcome.bucket;
        runRecords.push(outcome.record);
        counts.ok += 1;
        await wait(rateSeconds * 1000);
        continue;
      }
      failure = outcome.error;
    } catch (error) {
      failure = errorMessage(error);
    }

    logger.warn(`[batch] ${entry.id} failed: ${failure}`);
    await runLog.log(entry.id, "err", { bucket, error: failure });
    await runLog.markErr(entry.id, { id: entry.id, url: entry.url, error: failure });
    counts.err += 1;
  }

  const runBucket = await resolveRunBucket({ provided: options.bucket || null, adopted: bucket, profilesRoot });
  const aggregatePath = await saveAggregate(runRecords, profilesRoot, { bucket: runBucket, writeLatest });

  await runLog.writeSummary(
    buildRunSummary({
      runId: runLog.runId,
      runDir: runLog.runDir,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      bucket: runBucket,
      aggregatePath,
      counts
    })
  );

  logger.info(
    `[batch] run ${runLog.runId} done: ok=${counts.ok} skip=${counts.skip} err=${counts.err} bucket=${runBucket}`
  );

  return { runId: runLog.runId, runDir: runLog.runDir, bucket: runBucket, aggregatePath, counts };
}
