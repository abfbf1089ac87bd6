import * as cheerio from "cheerio";
import { AnyNode, Element, hasChildren, isText } from "domhandler";
import { EtfProfile } from "../types/record";
import { normalizeWhitespace } from "../utils/text";
import { nowUtcIsoSeconds } from "../utils/time";

/** Trimmed text nodes under `node`, joined with `separator`. */
function nodeText(node: AnyNode, separator: string): string {
  const parts: string[] = [];
  const visit = (current: AnyNode): void => {
    if (isText(current)) {
      const text = current.data.replace(/\u00a0/g, " ").trim();
      if (text) parts.push(text);
    } else if (hasChildren(current)) {
      current.children.forEach(visit);
    }
  };
  visit(node);
  return parts.join(separator);
}

function elementText(element: cheerio.Cheerio<AnyNode>, separator: string): string {
  return element
    .toArray()
    .map((node) => nodeText(node, separator))
    .filter((text) => text.length > 0)
    .join(separator);
}

export function extractName($: cheerio.CheerioAPI): string {
  return elementText($("h1").first(), "");
}

export function extractDescription($: cheerio.CheerioAPI): string {
  const container = $("div#etf-description-content").first();
  if (!container.length) return "";

  const parts = container
    .children("div")
    .toArray()
    .map((child) => nodeText(child, " "))
    .filter((text) => text.length > 0);

  return normalizeWhitespace(parts.join(" ")).replace(/\s+([.,;:])/g, "$1");
}

/** Label/value rows of the key-data table; values prefer `.val` then `.val2` elements. */
export function extractDataTable($: cheerio.CheerioAPI): Record<string, string> {
  const data: Record<string, string> = {};
  const table = $("table.etf-data-table").first();
  if (!table.length) return data;

  for (const row of table.find("tr").toArray()) {
    const $row = $(row);
    const label = $row.find("td.vallabel").first();
    const valueCell = $row.find("td").eq(1);
    if (!label.length || !valueCell.length) continue;

    const values = [
      ...valueCell.find(".val").toArray(),
      ...valueCell.find(".val2").toArray()
    ].map((node) => nodeText(node, " "));
    if (!values.length) values.push(elementText(valueCell, " "));

    data[elementText(label, " ")] = values.filter((value) => value.length > 0).join(" ");
  }
  return data;
}

/**
 * Exchange listings: the first `table.mobile-table` after `div#stock-exchange`
 * in document order. Rows whose cell count differs from the header count are
 * dropped (rowspan/colspan fragments).
 */
export function extractListings($: cheerio.CheerioAPI): Record<string, string>[] {
  const anchor = $("div#stock-exchange").get(0);
  if (!anchor) return [];

  const elements = $<Element, string>("*").toArray();
  const following = elements.slice(elements.indexOf(anchor) + 1);
  const tableNode = following.find((node) => node.tagName === "table" && $(node).hasClass("mobile-table"));
  if (!tableNode) return [];

  const table = $(tableNode);
  const headers = table
    .find("thead th")
    .toArray()
    .map((th) => nodeText(th, ""));

  const listings: Record<string, string>[] = [];
  for (const tr of table.find("tbody tr").toArray()) {
    const cells = $(tr)
      .find("td")
      .toArray()
      .map((td) => nodeText(td, ""));
    if (cells.length !== headers.length) continue;

    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = cells[index] ?? "";
    });
    listings.push(row);
  }
  return listings;
}

export function parseProfile(html: string, id: string, sourceUrl?: string | null): EtfProfile {
  const $ = cheerio.load(html);
  return {
    id,
    isin: id,
    name: extractName($),
    description: extractDescription($),
    data: extractDataTable($),
    listings: extractListings($),
    source_url: sourceUrl ?? "",
    last_fetched: nowUtcIsoSeconds()
  };
}
