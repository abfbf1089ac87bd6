import { JsonObject } from "./json";

export type RunStatus = "ok" | "skip" | "err";

export const STANDARD_PROGRESS_FIELDS = ["time", "id", "isin", "status", "bucket", "reason", "error"] as const;

export type ProgressLine = JsonObject & {
  time: string;
  id: string;
  status: RunStatus;
  bucket?: string;
  reason?: string;
  error?: string;
};

export interface ProgressDetails {
  bucket?: string | null;
  reason?: string | null;
  error?: string | null;
  extra?: Record<string, unknown>;
}

export interface RunCounts {
  ok: number;
  skip: number;
  err: number;
}

export interface RunSummary {
  schema_version: "1.0";
  run_id: string;
  run_dir: string;
  started_at: string;
  ended_at: string;
  bucket: string;
  aggregate_path: string;
  counts: RunCounts;
}
