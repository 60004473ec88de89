/**
 * Core data models for the labor & policy watch pipeline
 */

/**
 * Labels tied to a known institutional feed
 */
export type SourceCategory =
  | "legislative_notice"
  | "enforced_law"
  | "labor_ministry"
  | "fsc_press"
  | "dart_disclosure";

/**
 * Labels derived from title/summary keywords
 */
export type KeywordCategory =
  | "kcgs_news"
  | "esg_news"
  | "audit_disclosure"
  | "finance_news"
  | "labor_law_news"
  | "labor_news";

export type Category = SourceCategory | KeywordCategory | "news" | "other";

/**
 * Item as produced by an ingestion adapter
 */
export interface RawItem {
  title: string;
  link: string;
  summary: string; // May carry HTML or be empty
  publishedRaw: string; // Free-form date string, may be empty
  sourceFeed: string; // Endpoint the item came from
  sourceName?: string; // Publisher/outlet name when the feed carries one
}

export interface NormalizedItem extends Readonly<RawItem> {
  readonly category: Category;
  readonly publishedAt: Date | null; // null when the date could not be parsed
  readonly contentId: string;
}

export interface DeliveryRecord {
  contentId: string;
  title: string;
  link: string;
  publishedRaw: string;
  sourceFeed: string;
  category: Category;
  firstSeenAt: Date;
}

/**
 * Where a source's items come from and how to read them
 */
export type SourceDescriptor =
  | { kind: "rss"; url: string; label?: string }
  | { kind: "html"; url: string; label?: string }
  | { kind: "search"; query: string; label?: string };

/**
 * One entry of an ingested batch: an item, or a source that failed to load
 */
export type BatchEntry =
  | { kind: "item"; item: RawItem }
  | { kind: "error"; sourceFeed: string; group: string; error: string };

/**
 * Publication window for a curation pass: start inclusive, end exclusive
 */
export interface TimeWindow {
  start: Date;
  end: Date;
}
