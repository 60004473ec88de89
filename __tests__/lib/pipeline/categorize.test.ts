/**
 * Tests for source and keyword classification
 */

import { describe, it, expect } from "vitest";
import { classify, isSearchAggregator } from "@/src/lib/pipeline/categorize";
import { buildSearchUrl } from "@/src/lib/sources/search";

const GOOGLE_NEWS = buildSearchUrl("노동 OR ESG");

describe("classify", () => {
  describe("feed identity", () => {
    it("should map government feeds to their categories", () => {
      expect(classify("http://open.moleg.go.kr/data/xml/li_rssSH01.xml", "행정예고", "")).toBe(
        "legislative_notice"
      );
      expect(classify("http://open.moleg.go.kr/data/xml/ll_rssSH02.xml", "시행", "")).toBe(
        "enforced_law"
      );
      expect(classify("https://www.moel.go.kr/rss/lawinfo.do", "예고", "")).toBe("legislative_notice");
      expect(classify("https://www.moel.go.kr/rss/notice.do", "알림", "")).toBe("labor_ministry");
      expect(classify("https://www.korea.kr/rss/dept_moel.xml", "보도", "")).toBe("labor_ministry");
      expect(classify("http://www.fsc.go.kr/about/fsc_bbs_rss/?fid=0111", "보도", "")).toBe("fsc_press");
      expect(classify("https://dart.fss.or.kr/dsac001/main.do", "사업보고서", "")).toBe(
        "dart_disclosure"
      );
    });

    it("should let feed identity win over keywords", () => {
      expect(classify("https://www.moel.go.kr/rss/notice.do", "ESG 공시 안내", "")).toBe(
        "labor_ministry"
      );
    });

    it("should match feed identifiers case-insensitively", () => {
      expect(classify("https://WWW.FSC.GO.KR/rss", "보도", "")).toBe("fsc_press");
    });
  });

  describe("keywords", () => {
    it("should prefer the KCGS mention over the broader ESG set", () => {
      expect(classify(GOOGLE_NEWS, "한국ESG기준원, 지배구조 평가 발표", "")).toBe("kcgs_news");
    });

    it("should classify by the first matching keyword set", () => {
      expect(classify(GOOGLE_NEWS, "기업 ESG 경영 확산", "")).toBe("esg_news");
      expect(classify(GOOGLE_NEWS, "감사보고서 제출 마감 임박", "")).toBe("audit_disclosure");
      expect(classify(GOOGLE_NEWS, "금융위원회, 신규 규제 발표", "")).toBe("finance_news");
      expect(classify(GOOGLE_NEWS, "근로기준법 개정안 국회 통과", "")).toBe("labor_law_news");
      expect(classify(GOOGLE_NEWS, "육아휴직 급여 인상", "")).toBe("labor_news");
    });

    it("should read the summary as well as the title", () => {
      expect(classify(GOOGLE_NEWS, "정부 발표", "ESG 공시 의무화 일정")).toBe("esg_news");
    });

    it("should ignore case", () => {
      expect(classify(GOOGLE_NEWS, "중소기업 esg 지원", "")).toBe("esg_news");
    });

    it("should classify unknown feeds by keyword too", () => {
      expect(classify("https://example.com/feed.xml", "청년 채용 확대", "")).toBe("labor_news");
    });
  });

  describe("fallbacks", () => {
    it("should use news for unmatched search results", () => {
      expect(classify(GOOGLE_NEWS, "오늘의 날씨", "")).toBe("news");
    });

    it("should use other for unmatched unknown feeds", () => {
      expect(classify("https://example.com/feed.xml", "오늘의 날씨", "")).toBe("other");
    });

    it("should skip feed rules for aggregators even when the query names a government site", () => {
      expect(classify(buildSearchUrl("site:moel.go.kr"), "오늘의 날씨", "")).toBe("news");
    });
  });

  it("should be deterministic", () => {
    const first = classify(GOOGLE_NEWS, "파견 근로자 처우 개선", "요약");
    expect(classify(GOOGLE_NEWS, "파견 근로자 처우 개선", "요약")).toBe(first);
  });
});

describe("isSearchAggregator", () => {
  it("should recognize Google News search feeds", () => {
    expect(isSearchAggregator(GOOGLE_NEWS)).toBe(true);
    expect(isSearchAggregator("https://www.moel.go.kr/rss/notice.do")).toBe(false);
  });
});
