/**
 * HTML listing adapter for sources without a machine feed (DART latest disclosures)
 *
 * Every anchor pointing at a receipt number (rcpNo=) is one item. The date comes
 * from the anchor's table row.
 */

import * as cheerio from "cheerio";
import type { RawItem } from "../model";
import { ParseError } from "../errors";
import { collapseWhitespace } from "../utils/text";
import { fetchText, type HttpOptions, DEFAULT_HTTP_OPTIONS } from "./http";

const ITEM_ANCHOR = 'a[href*="rcpNo="]';
const ROW_DATE = /\d{4}[.\/-]\s?\d{1,2}[.\/-]\s?\d{1,2}(?:\.?\s+\d{1,2}:\d{2})?/;

function resolveLink(href: string, pageUrl: string): string | null {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Extract listing items from a page body
 */
export function parseListingHtml(html: string, pageUrl: string): RawItem[] {
  const $ = cheerio.load(html);
  const anchors = $(ITEM_ANCHOR);

  if (anchors.length === 0) {
    throw new ParseError(pageUrl, "no listing links found");
  }

  const items: RawItem[] = [];
  const seen = new Set<string>();

  anchors.each((_, element) => {
    const anchor = $(element);
    const link = resolveLink(anchor.attr("href") ?? "", pageUrl);
    if (!link || seen.has(link)) return;

    const title = collapseWhitespace(anchor.attr("title") || anchor.text());
    const row = anchor.closest("tr");
    const rowText = collapseWhitespace((row.length > 0 ? row : anchor.parent()).text());

    seen.add(link);
    items.push({
      title,
      link,
      summary: rowText,
      publishedRaw: rowText.match(ROW_DATE)?.[0] ?? "",
      sourceFeed: pageUrl,
    });
  });

  return items;
}

export async function fetchHtmlSource(url: string, http: HttpOptions = DEFAULT_HTTP_OPTIONS): Promise<RawItem[]> {
  const html = await fetchText(url, http);
  return parseListingHtml(html, url);
}
