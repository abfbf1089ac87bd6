import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { runInspectCommand } from "../src/commands/inspect";
import { runStatusCommand } from "../src/commands/status";
import { RunLog } from "../src/io/runLog";
import { saveAggregate, saveRecord } from "../src/io/snapshots";
import { makeTmpDir, removeDir } from "./helpers";

describe("reporting commands", () => {
  let dir: string;
  let configPath: string;
  let output: string[];

  beforeEach(async () => {
    dir = await makeTmpDir();
    configPath = path.join(dir, "refsnap.json");
    await fs.writeFile(configPath, JSON.stringify({ data_root: path.join(dir, "data") }), "utf8");
    output = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(" "));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("summarizes the latest run with error samples", async () => {
    const log = await RunLog.open(path.join(dir, "data"), { runId: "2025-10-30T08-00-00Z" });
    await log.log("A", "ok", { bucket: "2025-10-30" });
    await log.log("B", "err", { error: "timeout" });
    await log.markErr("B", { id: "B", url: "https://example.org/b", error: "timeout" });

    await runStatusCommand({ configPath });

    expect(output).toEqual([
      `Run 2025-10-30T08-00-00Z (${log.runDir})`,
      "  OK     1",
      "  SKIP   0",
      "  ERR    1",
      "  TOTAL  2",
      "Errors detected (1):",
      "- B: timeout"
    ]);
  });

  it("lists aggregate identifiers and prints single records", async () => {
    const profiles = path.join(dir, "data", "profiles");
    await saveRecord({ id: "A", name: "Fund A" }, profiles, { bucket: "2025-10-30" });
    await saveAggregate([{ id: "A", name: "Fund A" }, { id: "B" }], profiles, { bucket: "2025-10-30" });

    await runInspectCommand({ configPath, list: true });
    expect(output).toEqual(["0\tA\tFund A", "1\tB\t", "2 records"]);

    output.length = 0;
    await runInspectCommand({ configPath, id: "A" });
    expect(output).toEqual([JSON.stringify({ id: "A", name: "Fund A" }, null, 2)]);

    output.length = 0;
    await runInspectCommand({ configPath, buckets: true });
    expect(output).toEqual(["2025-10-30 (latest)"]);
  });
});
