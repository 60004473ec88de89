/**
 * Popularity ranking
 * Uses cross-outlet duplication as a coverage signal: the same headline carried by
 * more outlets ranks higher, fresher stories break ties.
 */

import type { NormalizedItem } from "../model";
import { logger } from "../logger";

export interface StoryBucket {
  key: string;
  items: NormalizedItem[];
  firstIndex: number;
  latest: number; // Most recent publishedAt in ms, -Infinity when none parsed
  representative: NormalizedItem;
}

// Bracketed annotations: [단독], (종합), 【속보】, <인터뷰>
const ANNOTATIONS = /\[[^\]]*\]|\([^)]*\)|【[^】]*】|<[^>]*>/g;

// Google News appends " - Outlet" to every headline
const OUTLET_SUFFIX = /\s+[-–—|]\s+[^-–—|]{1,30}$/;

function timeOf(item: NormalizedItem): number {
  return item.publishedAt ? item.publishedAt.getTime() : Number.NEGATIVE_INFINITY;
}

/**
 * Grouping key for a headline: annotations and outlet suffix removed, whitespace
 * collapsed, lowercased
 */
export function normalizeTitle(title: string): string {
  return title
    .replace(ANNOTATIONS, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(OUTLET_SUFFIX, "")
    .trim()
    .toLowerCase();
}

/**
 * Group items by normalized title (or link when the title normalizes to nothing)
 */
export function groupByStory(items: NormalizedItem[]): StoryBucket[] {
  const buckets = new Map<string, StoryBucket>();

  items.forEach((item, index) => {
    const key = normalizeTitle(item.title) || item.link;
    const bucket = buckets.get(key);

    if (!bucket) {
      buckets.set(key, {
        key,
        items: [item],
        firstIndex: index,
        latest: timeOf(item),
        representative: item,
      });
      return;
    }

    bucket.items.push(item);
    if (timeOf(item) > bucket.latest) {
      bucket.latest = timeOf(item);
      bucket.representative = item;
    }
  });

  return [...buckets.values()];
}

/**
 * Top K stories by (outlet count desc, latest publishedAt desc), one representative
 * each: the most recently published item of the story
 */
export function rankByPopularity(items: NormalizedItem[], k: number): NormalizedItem[] {
  if (k <= 0 || items.length === 0) {
    return [];
  }

  const buckets = groupByStory(items).sort(
    (a, b) =>
      b.items.length - a.items.length ||
      compareLatest(b.latest, a.latest) ||
      a.firstIndex - b.firstIndex
  );

  const selected = buckets.slice(0, k).map((bucket) => bucket.representative);

  logger.debug(`Ranked ${items.length} items into ${buckets.length} stories`, {
    top: buckets.slice(0, k).map((b) => ({ key: b.key, outlets: b.items.length })),
  });

  return selected;
}

// -Infinity - -Infinity is NaN; treat equal timestamps as a tie
function compareLatest(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? 1 : -1;
}
