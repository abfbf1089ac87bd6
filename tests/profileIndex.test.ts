import { afterEach, beforeEach, describe, expect, it, Mock, vi } from "vitest";
import { promises as fs, readFileSync } from "fs";
import path from "path";
import { getProfileIndex, loadSubsetFile, selectEntries } from "../src/discovery/profileIndex";
import { HttpFetcher } from "../src/fetch/httpFetcher";
import { resolveLatestBucket } from "../src/io/latestPointer";
import { saveIndex } from "../src/io/snapshots";
import { readJson } from "../src/utils/fs";
import { NotFoundError, ValidationError } from "../src/utils/errors";
import { makeTmpDir, removeDir } from "./helpers";

const SITEMAP_URL = "https://www.example.org/sitemap.xml";
const sitemapXml = readFileSync(path.join(process.cwd(), "fixtures", "sitemap.xml"), "utf8");

describe("profile index", () => {
  let dir: string;
  let root: string;
  let fetchImpl: Mock<(url: string, init?: RequestInit) => Promise<Response>>;
  let http: HttpFetcher;

  beforeEach(async () => {
    dir = await makeTmpDir();
    root = path.join(dir, "profile_index");
    fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response(sitemapXml, { status: 200 }));
    http = new HttpFetcher({
      userAgent: "refsnap-test/1.0",
      timeoutMs: 1000,
      maxTries: 1,
      responsesDir: path.join(dir, "responses"),
      policy: { cacheMode: "default", ttlSeconds: null, asOfBucket: "2025-10-30" },
      fetchImpl,
      logger: { info: () => undefined }
    });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const quiet = { info: (): void => undefined };

  it("builds and stores the index when none exists", async () => {
    const entries = await getProfileIndex({ root, http, sitemapUrl: SITEMAP_URL, logger: quiet });

    expect(entries.map((entry) => entry.id)).toEqual(["TEST00000001", "TEST00000002", "TEST00000003"]);
    expect(await resolveLatestBucket(root)).toBe("2025-10-30");
    expect(await readJson(path.join(root, "2025-10-30", "index.response.json"))).toMatchObject({
      kind: "index",
      bucket: "2025-10-30",
      response: { kind: "sitemap", url: SITEMAP_URL, as_of_bucket: "2025-10-30" }
    });
  });

  it("reuses a stored index without fetching", async () => {
    await saveIndex([{ id: "X1", url: "https://example.org/x1" }], root, { bucket: "2025-10-01" });

    const entries = await getProfileIndex({ root, http, sitemapUrl: SITEMAP_URL, logger: quiet });

    expect(entries).toEqual([{ id: "X1", url: "https://example.org/x1" }]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("rebuilds when forced", async () => {
    await saveIndex([{ id: "X1", url: "https://example.org/x1" }], root, { bucket: "2025-10-01" });

    const entries = await getProfileIndex({ root, http, sitemapUrl: SITEMAP_URL, forceRefresh: true, logger: quiet });

    expect(entries).toHaveLength(3);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(await resolveLatestBucket(root)).toBe("2025-10-30");
  });

  it("selects entries by id in the order asked", () => {
    const index = [
      { id: "A", url: "https://example.org/a" },
      { id: "B", url: "https://example.org/b" }
    ];
    expect(selectEntries(index, ["B", "A"]).map((entry) => entry.id)).toEqual(["B", "A"]);
    expect(() => selectEntries(index, ["C"])).toThrow(NotFoundError);
  });

  it("loads a subset file keyed by id or isin", async () => {
    const file = path.join(dir, "subset.json");
    await fs.writeFile(
      file,
      JSON.stringify([
        { isin: "TEST00000001", url: "https://example.org/1", lastmod: "2025-10-01" },
        { id: "custom-2", url: "https://example.org/2" }
      ]),
      "utf8"
    );

    expect(await loadSubsetFile(file)).toEqual([
      { id: "TEST00000001", isin: "TEST00000001", url: "https://example.org/1", lastmod: "2025-10-01" },
      { id: "custom-2", url: "https://example.org/2" }
    ]);

    await fs.writeFile(file, JSON.stringify([{ url: "https://example.org/3" }]), "utf8");
    await expect(loadSubsetFile(file)).rejects.toBeInstanceOf(ValidationError);
  });
});
