import { Dirent, promises as fs } from "fs";
import path from "path";
import { isJsonObject, JsonValue } from "../types/json";
import { RunStatus } from "../types/runLog";
import { errorMessage, hasErrnoCode, NotFoundError } from "../utils/errors";
import { readJson } from "../utils/fs";
import { PROGRESS_FILE } from "../io/paths";

export interface ProgressEntry {
  id: string;
  status: RunStatus | "unknown";
  error?: string;
}

export interface ProgressCounts {
  ok: number;
  skip: number;
  err: number;
  total: number;
}

export interface ErrorSample {
  file: string;
  id: string;
  error: string;
}

const KNOWN_STATUSES: ReadonlySet<string> = new Set(["ok", "skip", "err"]);

function isRunStatus(value: string): value is RunStatus {
  return KNOWN_STATUSES.has(value);
}

/** Lexicographically last run directory; default run ids sort by time. */
export async function latestRunDir(runsRootPath: string): Promise<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(runsRootPath, { withFileTypes: true });
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) {
      throw new NotFoundError(`No runs directory found: ${runsRootPath}`, runsRootPath);
    }
    throw error;
  }

  const names = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  const last = names[names.length - 1];
  if (last === undefined) {
    throw new NotFoundError(`No run directories found under ${runsRootPath}`, runsRootPath);
  }
  return path.join(runsRootPath, last);
}

function toProgressEntry(value: JsonValue): ProgressEntry | null {
  if (!isJsonObject(value)) return null;
  const id = typeof value.id === "string" ? value.id : typeof value.isin === "string" ? value.isin : "";
  const status = typeof value.status === "string" && isRunStatus(value.status) ? value.status : "unknown";
  const entry: ProgressEntry = { id, status };
  if (typeof value.error === "string") entry.error = value.error;
  return entry;
}

/** Ledger lines of a run; blank lines, malformed JSON and non-object lines are skipped. */
export async function loadProgress(runDirPath: string): Promise<ProgressEntry[]> {
  const progressPath = path.join(runDirPath, PROGRESS_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(progressPath, "utf8");
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) {
      throw new NotFoundError(`No progress file found in ${runDirPath}`, progressPath);
    }
    throw error;
  }

  const entries: ProgressEntry[] = [];
  for (const line of raw.split("\n")) {
    if (!line.trim()) continue;
    let value: JsonValue;
    try {
      value = JSON.parse(line);
    } catch {
      continue;
    }
    const entry = toProgressEntry(value);
    if (entry) entries.push(entry);
  }
  return entries;
}

export function summarizeProgress(progress: readonly ProgressEntry[]): ProgressCounts {
  const counts: ProgressCounts = { ok: 0, skip: 0, err: 0, total: 0 };
  for (const entry of progress) {
    if (entry.status === "unknown") continue;
    counts[entry.status] += 1;
    counts.total += 1;
  }
  return counts;
}

/** Up to `limit` error payloads from `err/`, in file-name order. */
export async function loadErrorSamples(runDirPath: string, limit = 5): Promise<ErrorSample[]> {
  const errDir = path.join(runDirPath, "err");
  let names: string[];
  try {
    names = await fs.readdir(errDir);
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) return [];
    throw error;
  }

  const files = names.filter((name) => name.endsWith(".json")).sort().slice(0, limit);
  const samples: ErrorSample[] = [];
  for (const file of files) {
    const fallbackId = decodeURIComponent(file.slice(0, -".json".length));
    try {
      const payload = await readJson(path.join(errDir, file));
      if (isJsonObject(payload)) {
        samples.push({
          file,
          id: typeof payload.id === "string" ? payload.id : fallbackId,
          error: typeof payload.error === "string" ? payload.error : ""
        });
      } else {
        samples.push({ file, id: fallbackId, error: "(unexpected error format)" });
      }
    } catch (error) {
      samples.push({ file, id: fallbackId, error: `(unreadable error file: ${errorMessage(error)})` });
    }
  }
  return samples;
}
