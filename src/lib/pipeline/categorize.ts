/**
 * Categorization pipeline
 * Feed identity decides first; title/summary keywords decide for search feeds and unknown sources
 */

import type { Category } from "../model";
import {
  KEYWORD_PATTERNS,
  SEARCH_AGGREGATOR_TOKENS,
  SOURCE_RULES,
  type SourceRule,
} from "../../config/categories";

/**
 * Tables the classifier reads; defaults to the frozen configuration
 */
export interface ClassifierTables {
  sourceRules: readonly SourceRule[];
  aggregatorTokens: readonly string[];
  keywordPatterns: ReadonlyArray<readonly [Category, RegExp]>;
}

export const DEFAULT_CLASSIFIER_TABLES: ClassifierTables = {
  sourceRules: SOURCE_RULES,
  aggregatorTokens: SEARCH_AGGREGATOR_TOKENS,
  keywordPatterns: KEYWORD_PATTERNS,
};

/**
 * Whether the feed is a keyword-search aggregator (e.g. Google News search RSS)
 */
export function isSearchAggregator(
  sourceFeed: string,
  tables: ClassifierTables = DEFAULT_CLASSIFIER_TABLES
): boolean {
  const feed = sourceFeed.toLowerCase();
  return tables.aggregatorTokens.some((token) => feed.includes(token));
}

function matchSourceRule(sourceFeed: string, rules: readonly SourceRule[]): Category | null {
  const feed = sourceFeed.toLowerCase();
  for (const rule of rules) {
    if (rule.tokens.every((token) => feed.includes(token.toLowerCase()))) {
      return rule.category;
    }
  }
  return null;
}

function matchKeywords(
  text: string,
  patterns: ReadonlyArray<readonly [Category, RegExp]>
): Category | null {
  for (const [category, pattern] of patterns) {
    if (pattern.test(text)) {
      return category;
    }
  }
  return null;
}

/**
 * Assign a category from (sourceFeed, title, summary) only
 */
export function classify(
  sourceFeed: string,
  title: string,
  summary: string,
  tables: ClassifierTables = DEFAULT_CLASSIFIER_TABLES
): Category {
  const aggregator = isSearchAggregator(sourceFeed, tables);

  if (!aggregator) {
    const bySource = matchSourceRule(sourceFeed, tables.sourceRules);
    if (bySource) {
      return bySource;
    }
  }

  const byKeyword = matchKeywords(`${title} ${summary}`, tables.keywordPatterns);
  if (byKeyword) {
    return byKeyword;
  }

  return aggregator ? "news" : "other";
}
