/**
 * Normalization pipeline
 * Converts raw adapter items to classified, timestamped, identified items
 */

import type { Category, NormalizedItem, RawItem } from "../model";
import { classify, type ClassifierTables, DEFAULT_CLASSIFIER_TABLES } from "./categorize";
import { identify } from "./identity";
import { KST_OFFSET_MINUTES, parseTimestamp } from "./temporal";
import { collapseWhitespace, htmlToText } from "../utils/text";
import { logger } from "../logger";

export interface NormalizeOptions {
  localOffsetMinutes?: number;
  tables?: ClassifierTables;
}

export interface NormalizeResult {
  items: NormalizedItem[];
  rejected: number; // Missing title, link or identifier
  categoryCounts: Partial<Record<Category, number>>;
}

/**
 * Normalize one raw item; null when it lacks a title or link
 */
export function normalizeItem(raw: RawItem, options: NormalizeOptions = {}): NormalizedItem | null {
  const title = collapseWhitespace(raw.title);
  const link = raw.link.trim();

  if (!title || !link) {
    logger.debug(`Rejecting item without title or link from ${raw.sourceFeed}`, {
      title,
      link,
    });
    return null;
  }

  const contentId = identify(title, link);
  if (!contentId) {
    return null;
  }

  const summary = htmlToText(raw.summary);
  const publishedRaw = raw.publishedRaw.trim();

  const item: NormalizedItem = {
    title,
    link,
    summary,
    publishedRaw,
    sourceFeed: raw.sourceFeed,
    sourceName: raw.sourceName,
    category: classify(raw.sourceFeed, title, summary, options.tables ?? DEFAULT_CLASSIFIER_TABLES),
    publishedAt: parseTimestamp(publishedRaw, options.localOffsetMinutes ?? KST_OFFSET_MINUTES),
    contentId,
  };

  if (publishedRaw && !item.publishedAt) {
    logger.debug(`Unparseable date "${publishedRaw}" for ${link}`);
  }

  return Object.freeze(item);
}

/**
 * Normalize a batch of raw items
 */
export function normalizeItems(rawItems: RawItem[], options: NormalizeOptions = {}): NormalizeResult {
  const items: NormalizedItem[] = [];
  const categoryCounts: Partial<Record<Category, number>> = {};
  let rejected = 0;

  for (const raw of rawItems) {
    const item = normalizeItem(raw, options);
    if (!item) {
      rejected++;
      continue;
    }
    items.push(item);
    categoryCounts[item.category] = (categoryCounts[item.category] ?? 0) + 1;
  }

  logger.info(`Normalized ${items.length} items (${rejected} rejected)`, { categoryCounts });
  return { items, rejected, categoryCounts };
}
