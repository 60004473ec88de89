/**
 * Tests for MarkdownV2 message rendering
 */

import { describe, it, expect } from "vitest";
import {
  escapeLinkUrl,
  escapeMarkdown,
  limitLength,
  renderItem,
  renderSourceError,
} from "@/src/lib/delivery/render";
import type { NormalizedItem } from "@/src/lib/model";

const NOTICE = "\n\n\\(이하 생략됨\\)";

function createItem(overrides: Partial<NormalizedItem> = {}): NormalizedItem {
  return {
    title: "근로기준법 개정 (종합)",
    link: "https://news.example.com/a_(1)",
    summary: "요약입니다.",
    publishedRaw: "Wed, 01 May 2024 01:30:00 GMT",
    sourceFeed: "https://news.google.com/rss/search?q=x",
    sourceName: "예시일보",
    category: "labor_law_news",
    publishedAt: new Date("2024-05-01T01:30:00Z"),
    contentId: "id-1",
    ...overrides,
  };
}

describe("escapeMarkdown", () => {
  it("should escape every MarkdownV2 special character", () => {
    expect(escapeMarkdown("a_b*c[d]e(f)g~h`i>j#k+l-m=n|o{p}q.r!s\\t")).toBe(
      "a\\_b\\*c\\[d\\]e\\(f\\)g\\~h\\`i\\>j\\#k\\+l\\-m\\=n\\|o\\{p\\}q\\.r\\!s\\\\t"
    );
  });

  it("should leave Hangul and ordinary punctuation alone", () => {
    expect(escapeMarkdown("고용노동부, 발표: 10%")).toBe("고용노동부, 발표: 10%");
  });
});

describe("escapeLinkUrl", () => {
  it("should escape only closing parentheses and backslashes", () => {
    expect(escapeLinkUrl("https://x.example.com/a_(1)?q=\\")).toBe("https://x.example.com/a_(1\\)?q=\\\\");
  });
});

describe("renderItem", () => {
  it("should render heading, link, summary and meta line", () => {
    expect(renderItem(createItem()).split("\n")).toEqual([
      "*\\[노동 관계 법령 개정 뉴스\\]*",
      "[근로기준법 개정 \\(종합\\)](https://news.example.com/a_(1\\))",
      "요약입니다\\.",
      "2024\\-05\\-01 10:30 · 예시일보",
    ]);
  });

  it("should mark undated items and omit a summary that repeats the title", () => {
    const message = renderItem(
      createItem({ publishedAt: null, sourceName: undefined, summary: "근로기준법 개정 (종합) 예시일보" })
    );
    expect(message.split("\n")).toEqual([
      "*\\[노동 관계 법령 개정 뉴스\\]*",
      "[근로기준법 개정 \\(종합\\)](https://news.example.com/a_(1\\))",
      "날짜 불명",
    ]);
  });

  it("should shorten long summaries", () => {
    const lines = renderItem(createItem({ summary: "가".repeat(250) })).split("\n");
    expect(lines[2]).toBe("가".repeat(199) + "…");
  });

  it("should format the date at the given offset", () => {
    const lines = renderItem(createItem(), 0).split("\n");
    expect(lines[3]).toBe("2024\\-05\\-01 01:30 · 예시일보");
  });
});

describe("limitLength", () => {
  it("should keep messages up to the limit", () => {
    const message = "a".repeat(4000);
    expect(limitLength(message)).toBe(message);
  });

  it("should cut longer messages and append a notice", () => {
    expect(limitLength("a".repeat(4001))).toBe("a".repeat(3900) + NOTICE);
  });

  it("should not leave a dangling escape at the cut", () => {
    const message = "a".repeat(3899) + "\\." + "b".repeat(200);
    expect(limitLength(message)).toBe("a".repeat(3899) + NOTICE);
  });

  it("should keep an escaped backslash whole", () => {
    const message = "a".repeat(3898) + "\\\\" + "b".repeat(200);
    expect(limitLength(message)).toBe("a".repeat(3898) + "\\\\" + NOTICE);
  });

  it("should drop a link the cut would split", () => {
    const message = "x".repeat(3890) + "[제목](https://example.com/" + "y".repeat(200) + ")";
    expect(limitLength(message)).toBe("x".repeat(3890) + NOTICE);
  });

  it("should keep links that close before the cut", () => {
    const message = "[제목](https://example.com/a)" + "x".repeat(4000);
    expect(limitLength(message)).toBe(message.slice(0, 3900) + NOTICE);
  });

  it("should treat escaped brackets as text", () => {
    const message = "a".repeat(3895) + "\\[abc" + "d".repeat(200);
    expect(limitLength(message)).toBe("a".repeat(3895) + "\\[abc" + NOTICE);
  });

  it("should not split a surrogate pair", () => {
    const message = "a".repeat(3899) + "😀" + "b".repeat(200);
    expect(limitLength(message)).toBe("a".repeat(3899) + NOTICE);
  });
});

describe("renderSourceError", () => {
  it("should render an escaped error notice", () => {
    expect(renderSourceError("노동-뉴스", "timeout")).toBe("\\[뉴스봇 오류\\] 노동\\-뉴스 요청 실패: timeout");
  });
});
