import path from "path";
import {
  ProgressDetails,
  ProgressLine,
  RunStatus,
  RunSummary,
  STANDARD_PROGRESS_FIELDS
} from "../types/runLog";
import { ValidationError } from "../utils/errors";
import { appendJsonLine, ensureDir, toJsonValue, touchFile, writeJson } from "../utils/fs";
import { nowUtcIsoFileSafe, nowUtcIsoSeconds } from "../utils/time";
import { entitySegment, PROGRESS_FILE, runDir, RUN_SUMMARY_FILE } from "./paths";

export const DEFAULT_RUN_NAMESPACE = "profiles";

const RUN_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const STANDARD_FIELDS: ReadonlySet<string> = new Set(STANDARD_PROGRESS_FIELDS);

export interface RunLogOptions {
  runId?: string | null;
  namespace?: string;
}

export function defaultRunId(): string {
  return nowUtcIsoFileSafe();
}

export function assertRunId(runId: string): string {
  if (!RUN_ID_PATTERN.test(runId) || runId === "." || runId === "..") {
    throw new ValidationError(`Run id must be a plain file name ([A-Za-z0-9._-]): '${runId}'`);
  }
  return runId;
}

/**
 * Append-only ledger for one batch run:
 *
 *   <base>/<namespace>/runs/<run_id>/progress.jsonl
 *   <base>/<namespace>/runs/<run_id>/ok/<id>.ok
 *   <base>/<namespace>/runs/<run_id>/err/<id>.json
 *
 * Every entity owns its own marker files, so a run needs no locking.
 */
export class RunLog {
  private constructor(
    readonly runId: string,
    readonly runDir: string
  ) {}

  /** Creates the run directories and an empty ledger; safe to repeat for the same run id. */
  static async open(basePath: string, options: RunLogOptions = {}): Promise<RunLog> {
    const runId = assertRunId(options.runId || defaultRunId());
    const log = new RunLog(runId, runDir(basePath, options.namespace ?? DEFAULT_RUN_NAMESPACE, runId));

    await ensureDir(log.okDir);
    await ensureDir(log.errDir);
    await touchFile(log.progressPath);
    return log;
  }

  get progressPath(): string {
    return path.join(this.runDir, PROGRESS_FILE);
  }

  get okDir(): string {
    return path.join(this.runDir, "ok");
  }

  get errDir(): string {
    return path.join(this.runDir, "err");
  }

  get summaryPath(): string {
    return path.join(this.runDir, RUN_SUMMARY_FILE);
  }

  okMarkerPath(id: string): string {
    return path.join(this.okDir, `${entitySegment(id)}.ok`);
  }

  errPayloadPath(id: string): string {
    return path.join(this.errDir, `${entitySegment(id)}.json`);
  }

  async log(id: string, status: RunStatus, details: ProgressDetails = {}): Promise<void> {
    const line: ProgressLine = {
      time: nowUtcIsoSeconds(),
      id,
      status
    };
    if (details.bucket != null) line.bucket = details.bucket;
    if (details.reason != null) line.reason = details.reason;
    if (details.error != null) line.error = details.error;

    for (const [key, value] of Object.entries(details.extra ?? {})) {
      if (STANDARD_FIELDS.has(key) || value === undefined) continue;
      line[key] = toJsonValue(value, `extra.${key}`);
    }

    await appendJsonLine(this.progressPath, line);
  }

  async markOk(id: string): Promise<void> {
    await touchFile(this.okMarkerPath(id));
  }

  /** Overwrites any earlier error payload for `id` in this run. */
  async markErr(id: string, payload: unknown): Promise<void> {
    await writeJson(this.errPayloadPath(id), payload);
  }

  async writeSummary(summary: RunSummary): Promise<string> {
    return writeJson(this.summaryPath, summary);
  }
}
