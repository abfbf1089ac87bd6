import { z } from "zod";

const HttpSchema = z.object({
  user_agent: z.string().min(1).default("refdata-snapshots/0.3 (+https://example.org/refdata-snapshots)"),
  timeout_ms: z.number().int().positive().default(60000),
  max_tries: z.number().int().positive().default(5)
});

const PolicySchema = z.object({
  cache_mode: z.enum(["default", "refresh", "offline"]).default("default"),
  ttl_seconds: z.number().nonnegative().nullable().default(null),
  /** Literal bucket name, or a pattern such as "%Y-%m-%d" formatted against today (UTC). */
  as_of_bucket: z.string().nullable().default("%Y-%m-%d")
});

const BatchSchema = z.object({
  rate_seconds: z.number().nonnegative().default(2),
  write_latest: z.boolean().default(true)
});

const SourcesSchema = z.object({
  sitemap_url: z.string().url().default("https://www.justetf.com/sitemap5.xml"),
  firds_api_url: z.string().url().default("https://api.data.fca.org.uk/fca_data_firds_files")
});

export const SettingsSchema = z.object({
  data_root: z.string().min(1).default("./data"),
  profiles_dir: z.string().min(1).default("profiles"),
  profile_index_dir: z.string().min(1).default("profile_index"),
  firds_index_dir: z.string().min(1).default("firds_index"),
  responses_dir: z.string().min(1).default("responses"),
  http: HttpSchema.default({}),
  policy: PolicySchema.default({}),
  batch: BatchSchema.default({}),
  sources: SourcesSchema.default({})
});

export type Settings = z.infer<typeof SettingsSchema>;
