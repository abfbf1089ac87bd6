import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ResponseProvenance } from "../src/types/provenance";

export async function makeTmpDir(prefix = "refsnap-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function fakeProvenance(overrides: Partial<ResponseProvenance> = {}): ResponseProvenance {
  return {
    id: "resp-1",
    requestId: "req-1",
    kind: "profile_html",
    url: "https://example.org/profile?isin=TEST00000001",
    path: null,
    checksum: null,
    createdAt: "2025-10-30T07:59:12Z",
    sizeBytes: 0,
    contentType: "text/html",
    status: 200,
    asOfBucket: null,
    cacheMode: "default",
    ttlSeconds: null,
    verify: () => true,
    ...overrides
  };
}

export const silentLogger = {
  info: (): void => undefined,
  warn: (): void => undefined
};
