/**
 * Keyword search adapter (Google News RSS search, Korean edition)
 */

import type { RawItem } from "../model";
import { fetchRssSource } from "./rss";
import { type HttpOptions, DEFAULT_HTTP_OPTIONS } from "./http";

const SEARCH_BASE = "https://news.google.com/rss/search";

export function buildSearchUrl(query: string): string {
  return `${SEARCH_BASE}?q=${encodeURIComponent(query)}&hl=ko&gl=KR&ceid=KR:ko`;
}

export async function fetchSearchSource(query: string, http: HttpOptions = DEFAULT_HTTP_OPTIONS): Promise<RawItem[]> {
  return fetchRssSource(buildSearchUrl(query), http);
}
