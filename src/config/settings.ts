import path from "path";
import { CachePolicy } from "../types/provenance";
import { isJsonObject, JsonObject } from "../types/json";
import { ValidationError } from "../utils/errors";
import { readJson } from "../utils/fs";
import { formatUtcPattern, todayIsoDate } from "../utils/time";
import { Settings, SettingsSchema } from "./settingsSchema";

export type Env = Record<string, string | undefined>;

export interface DataPaths {
  dataRoot: string;
  profilesRoot: string;
  profileIndexRoot: string;
  firdsIndexRoot: string;
  responsesRoot: string;
}

function envOverrides(env: Env): JsonObject {
  const overrides: JsonObject = {};
  const dataRoot = env.REFSNAP_DATA_ROOT?.trim();
  if (dataRoot) overrides.data_root = dataRoot;

  const rate = env.REFSNAP_RATE_SECONDS?.trim();
  if (rate) {
    const value = Number(rate);
    if (!Number.isFinite(value)) {
      throw new ValidationError(`REFSNAP_RATE_SECONDS must be a number, got '${rate}'`);
    }
    overrides.batch = { rate_seconds: value };
  }

  const cacheMode = env.REFSNAP_CACHE_MODE?.trim();
  if (cacheMode) overrides.policy = { cache_mode: cacheMode };
  return overrides;
}

function mergeSection(base: JsonObject, override: JsonObject): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isJsonObject(current) && isJsonObject(value) ? mergeSection(current, value) : value;
  }
  return merged;
}

/**
 * Reads the settings file (when given) and applies environment overrides.
 * Every field has a default, so no file at all yields a usable configuration.
 */
export async function loadSettings(configPath?: string | null, env: Env = process.env): Promise<Settings> {
  let fromFile: JsonObject = {};
  if (configPath) {
    const data = await readJson(configPath);
    if (!isJsonObject(data)) {
      throw new ValidationError(`Settings file must hold a JSON object: ${configPath}`);
    }
    fromFile = data;
  }
  return SettingsSchema.parse(mergeSection(fromFile, envOverrides(env)));
}

export function resolveAsOfBucket(value: string | null | undefined, now = new Date()): string {
  if (!value) return todayIsoDate(now);
  if (value.includes("%")) return formatUtcPattern(value, now);
  return value;
}

export function cachePolicyFrom(settings: Settings, now = new Date()): CachePolicy {
  return {
    cacheMode: settings.policy.cache_mode,
    ttlSeconds: settings.policy.ttl_seconds,
    asOfBucket: resolveAsOfBucket(settings.policy.as_of_bucket, now)
  };
}

export function dataPaths(settings: Settings): DataPaths {
  const dataRoot = path.resolve(settings.data_root);
  return {
    dataRoot,
    profilesRoot: path.join(dataRoot, settings.profiles_dir),
    profileIndexRoot: path.join(dataRoot, settings.profile_index_dir),
    firdsIndexRoot: path.join(dataRoot, settings.firds_index_dir),
    responsesRoot: path.join(dataRoot, settings.responses_dir)
  };
}
