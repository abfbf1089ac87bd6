import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { ZodError } from "zod";
import { cachePolicyFrom, dataPaths, loadSettings, resolveAsOfBucket } from "../src/config/settings";
import { ValidationError } from "../src/utils/errors";
import { makeTmpDir, removeDir } from "./helpers";

const NOW = new Date(Date.UTC(2025, 9, 30, 7, 59, 12));

describe("settings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTmpDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("yields complete defaults without a file", async () => {
    const settings = await loadSettings(null, {});

    expect(settings.data_root).toBe("./data");
    expect(settings.profiles_dir).toBe("profiles");
    expect(settings.http.max_tries).toBe(5);
    expect(settings.policy).toEqual({ cache_mode: "default", ttl_seconds: null, as_of_bucket: "%Y-%m-%d" });
    expect(settings.batch).toEqual({ rate_seconds: 2, write_latest: true });
  });

  it("merges the file over defaults and the environment over the file", async () => {
    const file = path.join(dir, "refsnap.json");
    await fs.writeFile(
      file,
      JSON.stringify({ data_root: "/srv/data", batch: { rate_seconds: 5, write_latest: false } }),
      "utf8"
    );

    const settings = await loadSettings(file, { REFSNAP_RATE_SECONDS: "0.5", REFSNAP_CACHE_MODE: "offline" });

    expect(settings.data_root).toBe("/srv/data");
    expect(settings.batch).toEqual({ rate_seconds: 0.5, write_latest: false });
    expect(settings.policy.cache_mode).toBe("offline");
  });

  it("rejects invalid values", async () => {
    await expect(loadSettings(null, { REFSNAP_RATE_SECONDS: "fast" })).rejects.toBeInstanceOf(ValidationError);
    await expect(loadSettings(null, { REFSNAP_CACHE_MODE: "sometimes" })).rejects.toBeInstanceOf(ZodError);

    const file = path.join(dir, "list.json");
    await fs.writeFile(file, "[]", "utf8");
    await expect(loadSettings(file, {})).rejects.toBeInstanceOf(ValidationError);
  });

  it("resolves bucket patterns against the UTC date", () => {
    expect(resolveAsOfBucket(null, NOW)).toBe("2025-10-30");
    expect(resolveAsOfBucket("", NOW)).toBe("2025-10-30");
    expect(resolveAsOfBucket("%Y-%m", NOW)).toBe("2025-10");
    expect(resolveAsOfBucket("%Y%m%dT%H%M%S", NOW)).toBe("20251030T075912");
    expect(resolveAsOfBucket("release-7", NOW)).toBe("release-7");
  });

  it("derives the cache policy and data paths", async () => {
    const settings = await loadSettings(null, { REFSNAP_DATA_ROOT: dir });

    expect(cachePolicyFrom(settings, NOW)).toEqual({ cacheMode: "default", ttlSeconds: null, asOfBucket: "2025-10-30" });
    expect(dataPaths(settings)).toEqual({
      dataRoot: dir,
      profilesRoot: path.join(dir, "profiles"),
      profileIndexRoot: path.join(dir, "profile_index"),
      firdsIndexRoot: path.join(dir, "firds_index"),
      responsesRoot: path.join(dir, "responses")
    });
  });
});
