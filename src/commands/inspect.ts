import { dataPaths, loadSettings } from "../config/settings";
import { listBuckets, loadAggregate, loadRecord } from "../io/snapshots";
import { resolveLatestBucket } from "../io/latestPointer";

export interface InspectCommandOptions {
  configPath?: string | null;
  bucket?: string | null;
  list?: boolean;
  buckets?: boolean;
  id?: string | null;
}

export async function runInspectCommand(options: InspectCommandOptions): Promise<void> {
  const settings = await loadSettings(options.configPath);
  const root = dataPaths(settings).profilesRoot;

  if (options.buckets) {
    const latest = await resolveLatestBucket(root);
    for (const bucket of await listBuckets(root)) {
      console.log(bucket === latest ? `${bucket} (latest)` : bucket);
    }
    return;
  }

  if (options.id) {
    const record = await loadRecord(root, { id: options.id, bucket: options.bucket });
    console.log(JSON.stringify(record, null, 2));
    return;
  }

  if (options.list) {
    const records = await loadAggregate(root, { bucket: options.bucket });
    records.forEach((record, index) => {
      const name = typeof record.name === "string" ? record.name : "";
      console.log(`${index}\t${record.id}\t${name}`);
    });
    console.log(`${records.length} records`);
    return;
  }

  console.log("Use --list to list identifiers, --id <id> to print one record or --buckets to list buckets.");
}
