import * as cheerio from "cheerio";
import { HttpFetcher } from "../fetch/httpFetcher";
import { ResponseProvenance } from "../types/provenance";
import { IndexEntry } from "../types/record";
import { normalizeWhitespace } from "../utils/text";

export const SITEMAP_KIND = "sitemap";

export interface ProfileIndexBuild {
  entries: IndexEntry[];
  provenance: ResponseProvenance | null;
}

function isinFromUrl(loc: string): string | null {
  let url: URL;
  try {
    url = new URL(loc);
  } catch {
    return null;
  }
  const isin = url.searchParams.get("isin")?.trim();
  return isin ? isin : null;
}

/**
 * Profile index from a sitemap. Every ETF appears once per language; entries
 * are keyed by ISIN and the `/en/` URL wins when there is one. Input that holds
 * no `<url><loc>` elements yields an empty list.
 */
export function parseSitemap(xml: string): IndexEntry[] {
  const $ = cheerio.load(xml, { xml: true });
  const profiles = new Map<string, IndexEntry>();

  for (const node of $("url").toArray()) {
    const $url = $(node);
    const loc = normalizeWhitespace($url.children("loc").first().text());
    if (!loc) continue;

    const isin = isinFromUrl(loc);
    if (!isin) continue;

    const entry: IndexEntry = { id: isin, isin, url: loc };
    const $lastmod = $url.children("lastmod").first();
    if ($lastmod.length) entry.lastmod = normalizeWhitespace($lastmod.text());

    const existing = profiles.get(isin);
    if (!existing || (loc.includes("/en/") && !existing.url.includes("/en/"))) {
      profiles.set(isin, entry);
    }
  }

  return [...profiles.values()];
}

export async function buildProfileIndex(http: HttpFetcher, sitemapUrl: string): Promise<ProfileIndexBuild> {
  const fetched = await http.get(SITEMAP_KIND, sitemapUrl, "application/xml");
  return { entries: parseSitemap(fetched.body), provenance: fetched.provenance };
}
