/**
 * Tests for the DART listing adapter
 */

import { describe, it, expect } from "vitest";
import { parseListingHtml } from "@/src/lib/sources/html";
import { ParseError } from "@/src/lib/errors";

const PAGE_URL = "https://dart.fss.or.kr/dsac001/main.do";

const LISTING = `<html><body>
<table>
  <tbody>
    <tr>
      <td>09:10</td>
      <td><a href="/dsaf001/main.do?rcpNo=20240501000001" title="삼성전자 분기보고서">삼성전자</a></td>
      <td>2024.05.01</td>
    </tr>
    <tr>
      <td><a href="/dsaf001/main.do?rcpNo=20240501000002"> 감사보고서   제출 </a></td>
      <td>2024-05-01 09:30</td>
    </tr>
    <tr>
      <td><a href="/dsaf001/main.do?rcpNo=20240501000001">중복</a></td>
    </tr>
  </tbody>
</table>
<p><a href="https://dart.fss.or.kr/dsaf001/main.do?rcpNo=20240502000003">기타공시</a> 2024.05.02</p>
<a href="/dsab001/main.do">공시서류검색</a>
</body></html>`;

describe("parseListingHtml", () => {
  it("should turn receipt links into items", () => {
    const items = parseListingHtml(LISTING, PAGE_URL);

    expect(items).toEqual([
      {
        title: "삼성전자 분기보고서",
        link: "https://dart.fss.or.kr/dsaf001/main.do?rcpNo=20240501000001",
        summary: "09:10 삼성전자 2024.05.01",
        publishedRaw: "2024.05.01",
        sourceFeed: PAGE_URL,
      },
      {
        title: "감사보고서 제출",
        link: "https://dart.fss.or.kr/dsaf001/main.do?rcpNo=20240501000002",
        summary: "감사보고서 제출 2024-05-01 09:30",
        publishedRaw: "2024-05-01 09:30",
        sourceFeed: PAGE_URL,
      },
      {
        title: "기타공시",
        link: "https://dart.fss.or.kr/dsaf001/main.do?rcpNo=20240502000003",
        summary: "기타공시 2024.05.02",
        publishedRaw: "2024.05.02",
        sourceFeed: PAGE_URL,
      },
    ]);
  });

  it("should raise ParseError when the layout has no receipt links", () => {
    expect(() => parseListingHtml("<html><body><p>점검 중</p></body></html>", PAGE_URL)).toThrow(ParseError);
  });
});
