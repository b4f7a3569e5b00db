import { describe, it, expect } from 'vitest';
import {
  createExtractionConfig,
  hasCompanyHint,
  isNumberLike,
  normalizeCompanyName,
} from '@bidsignal/agents';

describe('validators', () => {
  describe('normalizeCompanyName', () => {
    it('strips corporate markers', () => {
      expect(normalizeCompanyName('주식회사 가나다전자')).toBe('가나다전자');
      expect(normalizeCompanyName('(주)한빛시스템')).toBe('한빛시스템');
      expect(normalizeCompanyName('한빛시스템 (주)')).toBe('한빛시스템');
      expect(normalizeCompanyName('㈜다온정보통신')).toBe('다온정보통신');
    });

    it('strips trailing legal suffixes', () => {
      expect(normalizeCompanyName('Acme Data Co., Ltd.')).toBe('Acme Data');
      expect(normalizeCompanyName('Blue River Inc.')).toBe('Blue River');
    });

    it('trims edge punctuation and unpaired parentheses', () => {
      expect(normalizeCompanyName(' - 가나다전자, ')).toBe('가나다전자');
      expect(normalizeCompanyName('(가나다전자')).toBe('가나다전자');
    });

    it('rejects ban-listed phrases', () => {
      expect(normalizeCompanyName('제안요청서 검토')).toBeNull();
      expect(normalizeCompanyName('rfp partners')).toBeNull();
    });

    it('rejects short, letterless and particle-only values', () => {
      expect(normalizeCompanyName('가')).toBeNull();
      expect(normalizeCompanyName('12345')).toBeNull();
      expect(normalizeCompanyName('---')).toBeNull();
      expect(normalizeCompanyName('으로')).toBeNull();
      expect(normalizeCompanyName('에서')).toBeNull();
      expect(normalizeCompanyName(undefined)).toBeNull();
    });

    it('keeps two-syllable names that are not listed particles', () => {
      expect(normalizeCompanyName('가나')).toBe('가나');
      expect(normalizeCompanyName('(주)가나')).toBe('가나');
    });

    it('drops an inner corporate marker without leaving a space', () => {
      expect(normalizeCompanyName('한빛(주)시스템')).toBe('한빛시스템');
      expect(normalizeCompanyName('한빛 (주) 시스템')).toBe('한빛시스템');
    });

    it('rejects low alphanumeric density', () => {
      expect(normalizeCompanyName('###가나다###')).toBeNull();
    });

    it('rejects a long spaceless token without a hint', () => {
      const token = '하늘바다구름별빛노을새벽이슬햇살무지개꽃';
      expect(token).toHaveLength(20);
      expect(normalizeCompanyName(token)).toBeNull();
    });

    it('accepts a long token that carries a hint', () => {
      expect(normalizeCompanyName('하늘바다구름별빛노을새벽이슬햇살무지개정보')).toBe(
        '하늘바다구름별빛노을새벽이슬햇살무지개정보',
      );
    });

    it('accepts a long name with spaces', () => {
      expect(normalizeCompanyName('하늘 바다 구름 별빛 노을 새벽 이슬')).toBe('하늘 바다 구름 별빛 노을 새벽 이슬');
    });

    it('uses the injected ban list', () => {
      const config = createExtractionConfig({ banTokens: ['테스트'] });
      expect(normalizeCompanyName('테스트전자', config)).toBeNull();
      expect(normalizeCompanyName('제안요청서 전자', config)).toBe('제안요청서 전자');
    });
  });

  describe('hasCompanyHint', () => {
    it('matches sector words', () => {
      expect(hasCompanyHint('가나다전자')).toBe(true);
      expect(hasCompanyHint('가나다')).toBe(false);
    });
  });

  describe('isNumberLike', () => {
    it('accepts digits or unit tokens', () => {
      expect(isNumberLike('1,000')).toBe(true);
      expect(isNumberLike('십억원')).toBe(true);
      expect(isNumberLike('미정')).toBe(false);
      expect(isNumberLike(5)).toBe(false);
    });
  });
});
