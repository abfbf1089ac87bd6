import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { RunLog } from "../src/io/runLog";
import { runsRoot } from "../src/io/paths";
import { latestRunDir, loadErrorSamples, loadProgress, summarizeProgress } from "../src/report/runStatus";
import { NotFoundError } from "../src/utils/errors";
import { makeTmpDir, removeDir } from "./helpers";

describe("run status report", () => {
  let base: string;

  beforeEach(async () => {
    base = await makeTmpDir();
  });

  afterEach(async () => {
    await removeDir(base);
  });

  it("picks the lexicographically last run", async () => {
    await RunLog.open(base, { runId: "2025-10-29T08-00-00Z" });
    await RunLog.open(base, { runId: "2025-10-30T08-00-00Z" });

    const root = runsRoot(base, "profiles");
    expect(await latestRunDir(root)).toBe(path.join(root, "2025-10-30T08-00-00Z"));
  });

  it("raises NotFoundError without runs", async () => {
    const root = runsRoot(base, "profiles");
    await expect(latestRunDir(root)).rejects.toBeInstanceOf(NotFoundError);
    await fs.mkdir(root, { recursive: true });
    await expect(latestRunDir(root)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("counts ledger statuses and skips malformed lines", async () => {
    const log = await RunLog.open(base, { runId: "run-1" });
    await log.log("A", "ok", { bucket: "2025-10-30" });
    await log.log("B", "skip", { reason: "exists" });
    await log.log("C", "err", { error: "timeout" });
    await fs.appendFile(log.progressPath, "not json\n[1]\n\n", "utf8");

    const progress = await loadProgress(log.runDir);

    expect(progress).toEqual([
      { id: "A", status: "ok" },
      { id: "B", status: "skip" },
      { id: "C", status: "err", error: "timeout" }
    ]);
    expect(summarizeProgress(progress)).toEqual({ ok: 1, skip: 1, err: 1, total: 3 });
  });

  it("reads a handful of error payloads", async () => {
    const log = await RunLog.open(base, { runId: "run-1" });
    for (const id of ["E1", "E2", "E3"]) {
      await log.markErr(id, { id, url: `https://example.org/${id}`, error: `failed ${id}` });
    }
    await fs.writeFile(path.join(log.errDir, "E4.json"), "{", "utf8");

    expect(await loadErrorSamples(log.runDir, 2)).toEqual([
      { file: "E1.json", id: "E1", error: "failed E1" },
      { file: "E2.json", id: "E2", error: "failed E2" }
    ]);

    const all = await loadErrorSamples(log.runDir, 10);
    expect(all).toHaveLength(4);
    expect(all[3]?.id).toBe("E4");
    expect(all[3]?.error).toMatch(/^\(unreadable error file: Malformed JSON/);
  });
});
