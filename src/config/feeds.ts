/**
 * Feed configuration: source groups and their endpoints.
 * The group only names the source in logs and error notices; the category each item
 * is delivered under is decided by the classifier.
 */

import type { SourceDescriptor } from "../lib/model";

const LABOR_QUERY = [
  "노동", "근로", "인사노무", "육아휴직", "육아기 단축", "청년 고용", "모성보호", "출산휴가",
  "채용공고", "파견근로", "비정규직", "단시간 근로", "장애인 고용", "가족돌봄", "일가정양립",
].join(" OR ");

const LABOR_LAW_QUERY =
  "(근로기준법 OR 노동관계법 OR 남녀고용평등법 OR 모성보호 OR 산업안전보건법 OR 산안법 OR " +
  "파견근로자보호법 OR 기간제법 OR 고용정책기본법 OR 근로자퇴직급여보장법 OR 직장 내 괴롭힘) AND " +
  "(개정 OR 개정안 OR 일부개정 OR 법률안 OR 시행령 개정 OR 입법예고 OR 행정예고 OR 공포 OR 시행)";

export const FEEDS: Readonly<Record<string, readonly SourceDescriptor[]>> = {
  "법령-입법예고": [
    { kind: "rss", url: "http://open.moleg.go.kr/data/xml/li_rssSH01.xml", label: "법제처 입법예고" },
    { kind: "rss", url: "https://www.moel.go.kr/rss/lawinfo.do", label: "고용노동부 입법·행정예고" },
  ],
  "법령-시행법령": [
    { kind: "rss", url: "http://open.moleg.go.kr/data/xml/ll_rssSH02.xml", label: "법제처 최신 시행법령" },
  ],
  "노동-부처소식": [
    { kind: "rss", url: "https://www.korea.kr/rss/dept_moel.xml", label: "고용노동부 보도자료" },
    { kind: "rss", url: "https://www.moel.go.kr/rss/notice.do", label: "고용노동부 알려드립니다" },
    { kind: "rss", url: "https://www.moel.go.kr/rss/policy.do", label: "고용노동부 정책자료" },
  ],
  "금융위-보도자료": [
    { kind: "rss", url: "http://www.fsc.go.kr/about/fsc_bbs_rss/?fid=0111", label: "금융위원회 보도자료" },
    { kind: "rss", url: "http://www.fsc.go.kr/about/fsc_bbs_rss/?fid=0112", label: "금융위원회 보도설명" },
    { kind: "rss", url: "http://www.fsc.go.kr/about/fsc_bbs_rss/?fid=0114", label: "금융위원회 공지" },
  ],
  "금감원-DART": [
    { kind: "html", url: "https://dart.fss.or.kr/dsac001/main.do", label: "DART 최신공시" },
  ],
  "노동-뉴스": [
    { kind: "search", query: LABOR_QUERY, label: "인사노무 뉴스 검색" },
    { kind: "search", query: LABOR_LAW_QUERY, label: "노동법령 개정 뉴스 검색" },
  ],
  "금융-뉴스": [
    { kind: "search", query: "금융위원회 OR 금융위 OR 금감원 OR DART", label: "금융당국 뉴스 검색" },
  ],
  "ESG-뉴스": [
    { kind: "search", query: "ESG OR 지속가능경영 OR 지배구조", label: "ESG 뉴스 검색" },
    { kind: "search", query: '(KCGS OR "한국ESG기준원")', label: "KCGS 뉴스 검색" },
  ],
};
