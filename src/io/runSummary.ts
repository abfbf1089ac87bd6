import { RunCounts, RunSummary } from "../types/runLog";

export interface RunSummaryParams {
  runId: string;
  runDir: string;
  startedAt: string;
  endedAt: string;
  bucket: string;
  aggregatePath: string;
  counts: RunCounts;
}

export function buildRunSummary(params: RunSummaryParams): RunSummary {
  return {
    schema_version: "1.0",
    run_id: params.runId,
    run_dir: params.runDir,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    bucket: params.bucket,
    aggregate_path: params.aggregatePath,
    counts: { ...params.counts }
  };
}
