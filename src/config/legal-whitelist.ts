/**
 * Statutes that make a legislative notice worth delivering.
 * Matching ignores whitespace, so "고용정책 기본법" and "고용정책기본법" are the same entry.
 */
export const STATUTE_WHITELIST: readonly string[] = [
  "근로기준법",
  "남녀고용평등과 일ㆍ가정 양립 지원에 관한 법률",
  "남녀고용평등법",
  "산업안전보건법",
  "중대재해 처벌 등에 관한 법률",
  "파견근로자 보호 등에 관한 법률",
  "기간제 및 단시간근로자 보호 등에 관한 법률",
  "고용정책 기본법",
  "근로자퇴직급여 보장법",
  "최저임금법",
  "노동조합 및 노동관계조정법",
  "근로자참여 및 협력증진에 관한 법률",
  "고용보험법",
  "산업재해보상보험법",
  "임금채권보장법",
  "직업안정법",
  "장애인고용촉진 및 직업재활법",
  "외국인근로자의 고용 등에 관한 법률",
  "근로복지기본법",
  "고용상 연령차별금지 및 고령자고용촉진에 관한 법률",
  "주식회사 등의 외부감사에 관한 법률",
  "자본시장과 금융투자업에 관한 법률",
  "금융소비자 보호에 관한 법률",
];

/**
 * Softer second pass: labor, workplace safety, pay, audit and disclosure terms
 */
export const LEGAL_BACKUP_PATTERN =
  /근로|노동|고용|임금|산업안전|산업재해|퇴직|육아|모성보호|직장\s*내\s*괴롭힘|외부감사|회계|공시|지배구조/;
