import path from "path";
import { loadSettings, dataPaths } from "../config/settings";
import { runsRoot } from "../io/paths";
import { latestRunDir, loadErrorSamples, loadProgress, summarizeProgress } from "../report/runStatus";
import { NotFoundError } from "../utils/errors";
import { pathExists } from "../utils/fs";

export interface StatusCommandOptions {
  configPath?: string | null;
  runId?: string | null;
  samples?: number;
}

export async function runStatusCommand(options: StatusCommandOptions): Promise<void> {
  const settings = await loadSettings(options.configPath);
  const root = runsRoot(dataPaths(settings).dataRoot, settings.profiles_dir);

  let runDir: string;
  if (options.runId) {
    runDir = path.join(root, options.runId);
    if (!(await pathExists(runDir))) {
      throw new NotFoundError(`Run not found: ${runDir}`, runDir);
    }
  } else {
    runDir = await latestRunDir(root);
  }

  const progress = await loadProgress(runDir);
  const counts = summarizeProgress(progress);

  console.log(`Run ${path.basename(runDir)} (${runDir})`);
  console.log(`  OK     ${counts.ok}`);
  console.log(`  SKIP   ${counts.skip}`);
  console.log(`  ERR    ${counts.err}`);
  console.log(`  TOTAL  ${counts.total}`);

  if (counts.err === 0) {
    console.log("No errors detected.");
    return;
  }

  const samples = await loadErrorSamples(runDir, options.samples ?? 5);
  console.log(`Errors detected (${counts.err}):`);
  for (const sample of samples) {
    console.log(`- ${sample.id}: ${sample.error}`);
  }
  const more = counts.err - samples.length;
  if (more > 0) {
    console.log(`... and ${more} more`);
  }
}
