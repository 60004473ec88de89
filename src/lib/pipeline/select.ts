/**
 * Selection pipeline
 * Ordered filter chain over normalized items. Every stage only removes items and keeps
 * the relative order of the survivors; no stage changes an item.
 *
 * 0. admission   blocked domains, non-Korean headlines in keyword categories
 * 1. window      publishedAt in [start, end); undated items never pass a window
 * 2. whitelist   legislative categories must name a whitelisted statute (or match the backup pattern)
 * 3. popularity  top-K categories keep only their most widely covered stories
 * 4. duplicate   one item per story in news categories (most recent copy), exact repeats elsewhere
 * 5. cap         each category keeps its newest maxItems
 */

import type { Category, NormalizedItem, TimeWindow } from "../model";
import { CATEGORY_CONFIG, type CategoryConfig } from "../../config/categories";
import { LEGAL_BACKUP_PATTERN, STATUTE_WHITELIST } from "../../config/legal-whitelist";
import { groupByStory, rankByPopularity } from "./rank";
import { hasHangul } from "../utils/text";
import { logger } from "../logger";

export type CategoryTable = Readonly<Record<Category, CategoryConfig>>;

export interface CurationOptions {
  window: TimeWindow | null; // null: no-window pass, undated items included
  categories?: CategoryTable;
  statutes?: readonly string[];
  backupPattern?: RegExp;
}

export interface StageDrops {
  admission: number;
  window: number;
  whitelist: number;
  popularity: number;
  duplicate: number;
  cap: number;
}

export interface CurationResult {
  items: NormalizedItem[];
  dropped: StageDrops;
}

/**
 * Window ending `endBufferMinutes` before now and reaching back `windowHours`
 */
export function buildWindow(
  now: Date,
  windowHours: number,
  endBufferMinutes: number
): TimeWindow {
  return {
    start: new Date(now.getTime() - windowHours * 60 * 60 * 1000),
    end: new Date(now.getTime() - endBufferMinutes * 60 * 1000),
  };
}

export function isWithinWindow(item: NormalizedItem, window: TimeWindow): boolean {
  if (!item.publishedAt) return false;
  const t = item.publishedAt.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}

function linkHost(link: string): string {
  try {
    return new URL(link).hostname.toLowerCase();
  } catch {
    return link.toLowerCase();
  }
}

function isBlocked(link: string, domains: readonly string[]): boolean {
  const host = linkHost(link);
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

export function admitItems(items: NormalizedItem[], categories: CategoryTable): NormalizedItem[] {
  return items.filter((item) => {
    const config = categories[item.category];
    if (config.blockDomains && isBlocked(item.link, config.blockDomains)) {
      logger.debug(`Blocked domain for ${item.category}: ${item.link}`);
      return false;
    }
    if (config.requireKorean && !hasHangul(item.title)) {
      logger.debug(`Dropping non-Korean headline: ${item.title}`);
      return false;
    }
    return true;
  });
}

export function filterByWindow(items: NormalizedItem[], window: TimeWindow | null): NormalizedItem[] {
  if (!window) return items;
  return items.filter((item) => isWithinWindow(item, window));
}

function compact(text: string): string {
  return text.replace(/\s+/g, "");
}

/**
 * Whether the text names one of the statutes, ignoring whitespace
 */
export function mentionsStatute(text: string, statutes: readonly string[]): boolean {
  const haystack = compact(text);
  return statutes.some((statute) => haystack.includes(compact(statute)));
}

export function filterByWhitelist(
  items: NormalizedItem[],
  categories: CategoryTable,
  statutes: readonly string[],
  backupPattern: RegExp
): NormalizedItem[] {
  return items.filter((item) => {
    if (!categories[item.category].whitelistGated) return true;

    const text = `${item.title} ${item.summary}`;
    if (mentionsStatute(text, statutes)) return true;
    if (backupPattern.test(text)) {
      logger.debug(`Admitted by backup keywords: ${item.title}`);
      return true;
    }
    return false;
  });
}

function groupByCategory(items: NormalizedItem[]): Map<Category, NormalizedItem[]> {
  const groups = new Map<Category, NormalizedItem[]>();
  for (const item of items) {
    const group = groups.get(item.category);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.category, [item]);
    }
  }
  return groups;
}

export function filterByPopularity(items: NormalizedItem[], categories: CategoryTable): NormalizedItem[] {
  const admitted = new Set<NormalizedItem>();
  const ranked = new Set<Category>();

  for (const [category, group] of groupByCategory(items)) {
    const k = categories[category].popularityTopK;
    if (k === undefined) continue;
    ranked.add(category);
    for (const item of rankByPopularity(group, k)) {
      admitted.add(item);
    }
  }

  return items.filter((item) => !ranked.has(item.category) || admitted.has(item));
}

/**
 * Drop duplicates within each category. In story-grouped categories copies of a headline
 * from other outlets collapse to the most recent copy; elsewhere only repeats of the same
 * content id (overlapping feeds) are dropped, since listings reuse generic titles.
 */
export function collapseStories(items: NormalizedItem[], categories: CategoryTable): NormalizedItem[] {
  const kept = new Set<NormalizedItem>();

  for (const [category, group] of groupByCategory(items)) {
    if (categories[category].groupStories) {
      for (const bucket of groupByStory(group)) {
        kept.add(bucket.representative);
      }
      continue;
    }

    const seen = new Set<string>();
    for (const item of group) {
      if (seen.has(item.contentId)) continue;
      seen.add(item.contentId);
      kept.add(item);
    }
  }

  return items.filter((item) => kept.has(item));
}

export function capPerCategory(items: NormalizedItem[], categories: CategoryTable): NormalizedItem[] {
  const kept = new Set<NormalizedItem>();

  for (const [category, group] of groupByCategory(items)) {
    const newestFirst = [...group].sort((a, b) => {
      const ta = a.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
      const tb = b.publishedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
      return ta === tb ? 0 : tb > ta ? 1 : -1;
    });
    for (const item of newestFirst.slice(0, categories[category].maxItems)) {
      kept.add(item);
    }
  }

  return items.filter((item) => kept.has(item));
}

/**
 * Run the full filter chain
 */
export function curate(items: NormalizedItem[], options: CurationOptions): CurationResult {
  const categories = options.categories ?? CATEGORY_CONFIG;
  const statutes = options.statutes ?? STATUTE_WHITELIST;
  const backupPattern = options.backupPattern ?? LEGAL_BACKUP_PATTERN;

  const admitted = admitItems(items, categories);
  const windowed = filterByWindow(admitted, options.window);
  const whitelisted = filterByWhitelist(windowed, categories, statutes, backupPattern);
  const popular = filterByPopularity(whitelisted, categories);
  const unique = collapseStories(popular, categories);
  const capped = capPerCategory(unique, categories);

  const dropped: StageDrops = {
    admission: items.length - admitted.length,
    window: admitted.length - windowed.length,
    whitelist: windowed.length - whitelisted.length,
    popularity: whitelisted.length - popular.length,
    duplicate: popular.length - unique.length,
    cap: unique.length - capped.length,
  };

  logger.info(`Curated ${items.length} items → ${capped.length} candidates`, { ...dropped });
  return { items: capped, dropped };
}
