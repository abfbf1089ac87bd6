import { isJsonObject, JsonObject, JsonValue } from "./json";

/**
 * Schema-light entity: any JSON object carrying a non-empty string `id`.
 * Scraped attributes stay open so new fields survive without a model change.
 */
export type EntityRecord = JsonObject & { id: string };

export type IndexEntry = EntityRecord & {
  url: string;
  lastmod?: string;
};

export type EtfProfile = EntityRecord & {
  isin?: string;
  name?: string;
  description?: string;
  data?: { [label: string]: string };
  listings?: { [header: string]: string }[];
  source_url?: string;
  last_fetched?: string;
};

export type FirdsFileEntry = IndexEntry & {
  file_type: string;
  file_name: string;
  publication_date: string;
};

export function recordId(value: JsonValue | undefined): string | null {
  if (!isJsonObject(value)) return null;
  const id = value.id;
  return typeof id === "string" && id.trim().length > 0 ? id : null;
}

export function isEntityRecord(value: JsonValue | undefined): value is EntityRecord {
  return recordId(value) !== null;
}

export function isIndexEntry(value: JsonValue | undefined): value is IndexEntry {
  return isEntityRecord(value) && typeof value.url === "string" && value.url.length > 0;
}
