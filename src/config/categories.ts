/**
 * Category configuration and metadata
 * Display names, classification tables and curation limits per category
 */

import type { Category, KeywordCategory, SourceCategory } from "../lib/model";

export interface CategoryConfig {
  name: string; // Heading used in delivered messages
  maxItems: number; // Max items delivered per pass
  popularityTopK?: number; // Only the K most widely covered stories survive
  groupStories?: boolean; // Copies of one headline from several outlets count as one item
  whitelistGated?: boolean; // Must name a whitelisted statute (or match the backup pattern)
  requireKorean?: boolean; // Drop titles without any Hangul
  blockDomains?: readonly string[]; // Links on these domains are never admitted
}

export const CATEGORY_CONFIG: Readonly<Record<Category, CategoryConfig>> = Object.freeze({
  legislative_notice: {
    name: "법령 입법예고",
    maxItems: 10,
    whitelistGated: true,
  },

  enforced_law: {
    name: "최신 시행법령",
    maxItems: 10,
    whitelistGated: true,
  },

  labor_ministry: {
    name: "고용노동부 보도자료·정책 알림",
    maxItems: 5,
  },

  fsc_press: {
    name: "금융위원회 보도자료·정책 알림",
    maxItems: 5,
  },

  dart_disclosure: {
    name: "DART 최신 공시",
    maxItems: 5,
  },

  kcgs_news: {
    name: "KCGS(한국ESG기준원) 관련 뉴스",
    maxItems: 1,
    popularityTopK: 1,
    groupStories: true,
    requireKorean: true,
    blockDomains: ["cgs.or.kr", "kcgs.or.kr"],
  },

  esg_news: {
    name: "ESG 뉴스",
    maxItems: 3,
    popularityTopK: 3,
    groupStories: true,
    requireKorean: true,
  },

  audit_disclosure: {
    name: "감사·공시 뉴스",
    maxItems: 5,
    groupStories: true,
    requireKorean: true,
  },

  finance_news: {
    name: "금융당국 뉴스",
    maxItems: 5,
    groupStories: true,
    requireKorean: true,
  },

  labor_law_news: {
    name: "노동 관계 법령 개정 뉴스",
    maxItems: 10,
    groupStories: true,
    requireKorean: true,
  },

  labor_news: {
    name: "인사노무 뉴스",
    maxItems: 10,
    groupStories: true,
    requireKorean: true,
  },

  news: {
    name: "기타 뉴스",
    maxItems: 5,
    groupStories: true,
    requireKorean: true,
  },

  other: {
    name: "기타",
    maxItems: 5,
  },
});

/**
 * Feed-identity rule: every token must occur in the feed identifier
 */
export interface SourceRule {
  tokens: readonly string[];
  category: SourceCategory;
}

/**
 * Ordered: multi-token rules come before the single-token rules they overlap with
 */
export const SOURCE_RULES: readonly SourceRule[] = [
  { tokens: ["moel.go.kr", "lawinfo"], category: "legislative_notice" },
  { tokens: ["moleg.go.kr", "ll_rss"], category: "enforced_law" },
  { tokens: ["moleg.go.kr"], category: "legislative_notice" },
  { tokens: ["korea.kr", "dept_moel"], category: "labor_ministry" },
  { tokens: ["moel.go.kr"], category: "labor_ministry" },
  { tokens: ["fsc.go.kr"], category: "fsc_press" },
  { tokens: ["dart.fss.or.kr"], category: "dart_disclosure" },
];

/**
 * Feed identifiers of keyword-search aggregators
 */
export const SEARCH_AGGREGATOR_TOKENS: readonly string[] = ["news.google.com"];

/**
 * Ordered keyword fallback: the first matching pattern decides
 */
export const KEYWORD_PATTERNS: ReadonlyArray<readonly [KeywordCategory, RegExp]> = [
  ["kcgs_news", /KCGS|한국ESG기준원|한국기업지배구조원/i],
  ["esg_news", /ESG|지속가능경영|지속가능성|지배구조|탄소중립|기후공시/i],
  ["audit_disclosure", /외부감사|감사보고서|회계감사|감사인|전자공시|DART|공시/i],
  ["finance_news", /금융위원회|금융위|금융감독원|금감원|금융당국/i],
  [
    "labor_law_news",
    /근로기준법|남녀고용평등|산업안전보건법|산안법|노동관계법|노동법|기간제법|파견법|퇴직급여법|최저임금법|중대재해처벌법|노동조합법/i,
  ],
  [
    "labor_news",
    /노동|근로|인사노무|고용|채용|육아휴직|육아기|모성보호|출산휴가|파견|비정규직|단시간|장애인 ?고용|가족돌봄|일가정|워라밸|임금/i,
  ],
];

export function isCategory(value: string): value is Category {
  return Object.prototype.hasOwnProperty.call(CATEGORY_CONFIG, value);
}

export function getCategoryConfig(category: Category): CategoryConfig {
  return CATEGORY_CONFIG[category];
}
