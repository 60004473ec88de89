/**
 * RSS 2.0 / Atom adapter
 */

import Parser from "rss-parser";
import type { RawItem } from "../model";
import { ParseError } from "../errors";
import { fetchText, type HttpOptions, DEFAULT_HTTP_OPTIONS } from "./http";

interface FeedItemExtras {
  dcDate?: string;
  published?: string; // Atom
  updated?: string; // Atom
  source?: unknown; // Google News: <source url="...">Outlet</source>
}

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
  customFields: {
    item: [
      ["dc:date", "dcDate"],
      ["published", "published"],
      ["updated", "updated"],
      ["source", "source"],
    ],
  },
});

/**
 * Text of an element that xml2js may have turned into { _: text, $: attrs }
 */
function elementText(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined;
  if (value && typeof value === "object" && "_" in value && typeof value._ === "string") {
    return value._.trim() || undefined;
  }
  return undefined;
}

function itemLink(item: Parser.Item): string {
  if (item.link) return item.link;
  // Some government feeds only carry the article URL in <guid>
  return item.guid?.startsWith("http") ? item.guid : "";
}

/**
 * Parse a feed body into raw items
 */
export async function parseFeedXml(xml: string, sourceFeed: string): Promise<RawItem[]> {
  let feed: Parser.Output<FeedItemExtras>;
  try {
    feed = await parser.parseString(xml);
  } catch (error) {
    throw new ParseError(sourceFeed, error instanceof Error ? error.message : String(error));
  }

  return feed.items.map((item): RawItem => ({
    title: item.title ?? "",
    link: itemLink(item),
    summary: item.content ?? item.contentSnippet ?? item.summary ?? "",
    publishedRaw: item.pubDate ?? item.dcDate ?? item.published ?? item.updated ?? item.isoDate ?? "",
    sourceFeed,
    sourceName: elementText(item.source) ?? item.creator,
  }));
}

/**
 * Fetch and parse one feed URL
 */
export async function fetchRssSource(url: string, http: HttpOptions = DEFAULT_HTTP_OPTIONS): Promise<RawItem[]> {
  const xml = await fetchText(url, http);
  return parseFeedXml(xml, url);
}
