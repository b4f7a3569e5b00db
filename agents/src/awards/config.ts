/**
 * Keyword sets and tunables shared by the award extractors.
 *
 * Everything here is injected: extractors take an `ExtractionConfig` and fall
 * back to `defaultExtractionConfig`, so tests can swap in fixture keyword sets.
 */

export interface ExtractionConfig {
  /** Boilerplate / meta phrases that disqualify a company-name candidate */
  banTokens: readonly string[];
  /** Substrings that strongly suggest a company name */
  companyHints: readonly string[];
  /** Legal-entity markers stripped from names (주식회사, ㈜, ...) */
  corporateMarkers: readonly string[];
  /** Bare particles that are never names on their own */
  particles: readonly string[];
  /** Currency / unit tokens that make a string amount-like */
  amountUnits: readonly string[];

  winnerKeywords: readonly string[];
  companyLabelKeywords: readonly string[];
  amountKeywords: readonly string[];
  agencyKeywords: readonly string[];
  reasonKeywords: readonly string[];

  /** Competitor intel: a page must mention one of these to be considered */
  awardContextKeywords: readonly string[];
  /** Competitor intel: tokens that mark a line as naming an institution */
  institutionKeywords: readonly string[];
  /** Competitor intel: tokens counted for the concentration index */
  competitionKeywords: readonly string[];

  minCandidateScore: number;
  proximityWindow: number;
  maxCandidateWinners: number;
  maxCandidateReasons: number;
  reasonMaxLength: number;

  chunkSize: number;
  snippetLength: number;
  stripMarkup: boolean;

  maxTopWinners: number;
  maxTopReasons: number;
  maxAgencies: number;
  maxLegacyWinners: number;
  maxEvidences: number;

  maxTopCompetitors: number;
  maxIntelEvidences: number;
  maxTopicTags: number;
  agencyScanLines: number;
  agencyMaxLength: number;
  concentrationNormalizer: number;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export const defaultExtractionConfig: Readonly<ExtractionConfig> = deepFreeze({
  banTokens: [
    '결정기준',
    '결정방식',
    '유의사항',
    '제안요청서',
    'RFP',
    '제안서',
    '내용이',
    '상세',
    '계획서',
    '시험운영',
    '평가기준',
    '가점',
    '감점',
    '배점',
    '평가표',
    '제출서류',
    '입찰공고',
    '제안요청',
    '공고',
    '발주',
    '과업',
    '범위',
    '목적',
    '가 제안한',
    '에대해결과',
    '에서 제외함',
    '통보',
    '필요시',
    '해야 하며',
    'evaluation criteria',
    'submission documents',
    'request for proposal',
  ],
  companyHints: [
    '주식회사',
    '㈜',
    '(주)',
    '(유)',
    '유한',
    '재단',
    '협동조합',
    '컨소시엄',
    '엔지니어링',
    '시스템',
    '정보',
    '테크',
    '솔루션',
    '컨설팅',
    '개발',
    '산업',
    '전자',
    '통신',
    '소프트',
    '데이터',
    '산학협력단',
    '협회',
    '연구원',
    '연구소',
    '코리아',
    'INC',
    'Inc',
    'LTD',
    'Ltd',
    'Co.',
    'Corp',
    'Company',
    'Limited',
  ],
  corporateMarkers: ['주식회사', '㈜', '(주)', '(유)', '(재)'],
  particles: ['은', '는', '이', '가', '을', '를', '의', '에', '와', '과', '도', '로', '으로', '에서', '및', '등'],
  amountUnits: ['천만원', '백만원', '만원', '억원', '원', 'KRW', '₩'],

  winnerKeywords: [
    '낙찰자',
    '낙찰 업체',
    '낙찰업체',
    '우선협상대상자',
    '우선협상 대상자',
    '계약상대자',
    '선정 업체',
    '선정업체',
  ],
  companyLabelKeywords: ['업체명', '사업자', '제안사', '업체'],
  amountKeywords: ['낙찰금액', '계약금액', '추정가격', '투찰금액'],
  agencyKeywords: [
    '발주기관',
    '수요기관',
    '구매기관',
    '발주 부서',
    '계약기관',
    '계약부서',
    '발주처',
    '수요처',
  ],
  reasonKeywords: ['사유', '근거', '평가', '정성', '정량', '우수', '기술', '가격', '낙찰', '선정'],

  awardContextKeywords: ['낙찰', '개찰', '입찰 결과', '낙찰자', '협상대상자', '계약 체결'],
  institutionKeywords: ['조달청', '공단', '청', '원', '부', '시', '기관'],
  competitionKeywords: ['입찰', '경쟁', '제안서', '기술평가'],

  minCandidateScore: 2,
  proximityWindow: 40,
  maxCandidateWinners: 10,
  maxCandidateReasons: 10,
  reasonMaxLength: 100,

  chunkSize: 9000,
  snippetLength: 240,
  stripMarkup: true,

  maxTopWinners: 8,
  maxTopReasons: 8,
  maxAgencies: 6,
  maxLegacyWinners: 5,
  maxEvidences: 20,

  maxTopCompetitors: 5,
  maxIntelEvidences: 10,
  maxTopicTags: 8,
  agencyScanLines: 80,
  agencyMaxLength: 60,
  concentrationNormalizer: 40,
});

/**
 * Build a frozen config from the defaults plus overrides.
 */
export function createExtractionConfig(
  overrides: Partial<ExtractionConfig> = {},
): Readonly<ExtractionConfig> {
  return deepFreeze({ ...defaultExtractionConfig, ...overrides });
}
