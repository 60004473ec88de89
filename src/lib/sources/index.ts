/**
 * Ingestion over all configured sources
 * Sources are fetched one at a time; a failing source becomes an error entry in the
 * batch instead of aborting it.
 */

import type { BatchEntry, RawItem, SourceDescriptor } from "../model";
import { describeError } from "../errors";
import { logger } from "../logger";
import { fetchRssSource } from "./rss";
import { fetchHtmlSource } from "./html";
import { buildSearchUrl, fetchSearchSource } from "./search";
import { type HttpOptions, DEFAULT_HTTP_OPTIONS } from "./http";

export type FeedTable = Readonly<Record<string, readonly SourceDescriptor[]>>;

export type SourceFetcher = (descriptor: SourceDescriptor, http: HttpOptions) => Promise<RawItem[]>;

/**
 * Endpoint identifier recorded as the items' sourceFeed
 */
export function sourceEndpoint(descriptor: SourceDescriptor): string {
  return descriptor.kind === "search" ? buildSearchUrl(descriptor.query) : descriptor.url;
}

export async function fetchSource(descriptor: SourceDescriptor, http: HttpOptions): Promise<RawItem[]> {
  switch (descriptor.kind) {
    case "rss":
      return fetchRssSource(descriptor.url, http);
    case "html":
      return fetchHtmlSource(descriptor.url, http);
    case "search":
      return fetchSearchSource(descriptor.query, http);
  }
}

export interface IngestOptions {
  http?: HttpOptions;
  fetcher?: SourceFetcher;
}

/**
 * Fetch every source of every group into one batch
 */
export async function ingestSources(feeds: FeedTable, options: IngestOptions = {}): Promise<BatchEntry[]> {
  const http = options.http ?? DEFAULT_HTTP_OPTIONS;
  const fetcher = options.fetcher ?? fetchSource;
  const batch: BatchEntry[] = [];

  for (const [group, descriptors] of Object.entries(feeds)) {
    for (const descriptor of descriptors) {
      const sourceFeed = sourceEndpoint(descriptor);
      const label = descriptor.label ?? group;

      try {
        const items = await fetcher(descriptor, http);
        if (items.length === 0) {
          logger.warn(`[INGEST] ${label}: response parsed but contained 0 entries`, { sourceFeed });
        } else {
          logger.info(`[INGEST] ${label}: ${items.length} entries`);
        }
        for (const item of items) {
          batch.push({ kind: "item", item });
        }
      } catch (error) {
        logger.warn(`[INGEST] ${label}: source failed`, { sourceFeed, error: describeError(error) });
        batch.push({ kind: "error", sourceFeed, group: label, error: describeError(error) });
      }
    }
  }

  return batch;
}
