/**
 * Tests for popularity ranking
 */

import { describe, it, expect } from "vitest";
import { groupByStory, normalizeTitle, rankByPopularity } from "@/src/lib/pipeline/rank";
import type { NormalizedItem } from "@/src/lib/model";

function createItem(title: string, link: string, publishedAt: string | null): NormalizedItem {
  return {
    title,
    link,
    summary: "",
    publishedRaw: publishedAt ?? "",
    sourceFeed: "https://news.google.com/rss/search?q=ESG",
    category: "esg_news",
    publishedAt: publishedAt ? new Date(publishedAt) : null,
    contentId: link,
  };
}

describe("normalizeTitle", () => {
  it("should strip annotations and the outlet suffix", () => {
    expect(normalizeTitle("[속보] 최저임금 결정 (종합) - 연합뉴스")).toBe("최저임금 결정");
    expect(normalizeTitle("【단독】 ESG 공시 <인터뷰>")).toBe("esg 공시");
  });

  it("should collapse whitespace and lowercase", () => {
    expect(normalizeTitle("  ESG   Report  ")).toBe("esg report");
  });
});

describe("groupByStory", () => {
  it("should group copies of the same headline from different outlets", () => {
    const buckets = groupByStory([
      createItem("ESG 공시 확대 - 한경", "https://a.example.com/1", "2024-05-01T01:00:00Z"),
      createItem("ESG 공시 확대 - 매경", "https://b.example.com/1", "2024-05-01T02:00:00Z"),
      createItem("탄소중립 로드맵", "https://c.example.com/1", "2024-05-01T03:00:00Z"),
    ]);

    expect(buckets.map((b) => [b.key, b.items.length])).toEqual([
      ["esg 공시 확대", 2],
      ["탄소중립 로드맵", 1],
    ]);
    expect(buckets[0].representative.link).toBe("https://b.example.com/1");
  });

  it("should key on the link when the title normalizes to nothing", () => {
    const buckets = groupByStory([createItem("[단독]", "https://a.example.com/x", null)]);
    expect(buckets[0].key).toBe("https://a.example.com/x");
  });
});

describe("rankByPopularity", () => {
  const a1 = createItem("A 기사 - 한겨레", "https://a.example.com/1", "2024-05-01T01:00:00Z");
  const b1 = createItem("B 기사 - 경향", "https://b.example.com/1", "2024-05-01T05:00:00Z");
  const c1 = createItem("C 기사 - 조선", "https://c.example.com/1", "2024-05-01T02:00:00Z");
  const a2 = createItem("[단독] A 기사 - 중앙", "https://a.example.com/2", "2024-05-01T03:00:00Z");
  const c2 = createItem("C 기사 - 동아", "https://c.example.com/2", "2024-05-01T01:30:00Z");
  const a3 = createItem("A 기사 - 국민", "https://a.example.com/3", "2024-05-01T02:30:00Z");

  it("should return the most covered stories, one representative each", () => {
    const ranked = rankByPopularity([a1, b1, c1, a2, c2, a3], 2);
    expect(ranked).toEqual([a2, c1]);
  });

  it("should break size ties by recency", () => {
    const older = createItem("오래된 기사", "https://x.example.com/1", "2024-05-01T01:00:00Z");
    const newer = createItem("새 기사", "https://x.example.com/2", "2024-05-01T02:00:00Z");
    expect(rankByPopularity([older, newer], 1)).toEqual([newer]);
  });

  it("should rank undated stories after dated ones, then by first appearance", () => {
    const undated1 = createItem("날짜 없음 1", "https://x.example.com/1", null);
    const undated2 = createItem("날짜 없음 2", "https://x.example.com/2", null);
    const dated = createItem("날짜 있음", "https://x.example.com/3", "2024-05-01T01:00:00Z");
    expect(rankByPopularity([undated1, undated2, dated], 3)).toEqual([dated, undated1, undated2]);
  });

  it("should return every story when k exceeds the story count", () => {
    expect(rankByPopularity([a1, b1], 5)).toHaveLength(2);
  });

  it("should return nothing for k <= 0 or no items", () => {
    expect(rankByPopularity([a1, b1], 0)).toEqual([]);
    expect(rankByPopularity([], 3)).toEqual([]);
  });
});
