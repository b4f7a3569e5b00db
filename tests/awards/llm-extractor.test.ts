import { describe, it, expect, vi } from 'vitest';
import type { LogEvent } from '@bidsignal/llm';
import {
  buildChunkPrompt,
  chunkText,
  createExtractionConfig,
  extractPageWithLlm,
} from '@bidsignal/agents';

const noDelay = { retries: 2, delayMs: 0 };

const page = (text: string) => ({ url: 'https://example.org/n/1', title: '개찰 결과', text });

describe('llm-extractor', () => {
  describe('chunkText', () => {
    it('returns the body as one chunk when it fits', () => {
      expect(chunkText('a\n\nb', 100)).toEqual(['a\n\nb']);
    });

    it('joins paragraphs greedily up to the limit', () => {
      expect(chunkText('aaaaaa\n\nbbbbbb\n\ncc', 10)).toEqual(['aaaaaa', 'bbbbbb\n\ncc']);
    });

    it('gives an oversized paragraph its own chunk', () => {
      expect(chunkText(`short\n\n${'x'.repeat(15)}`, 10)).toEqual(['short', 'x'.repeat(15)]);
    });
  });

  describe('buildChunkPrompt', () => {
    it('fills title, url and body and keeps the JSON shape', () => {
      const prompt = buildChunkPrompt({ title: 'T', url: 'https://u', body: '본문' });
      expect(prompt).toContain('[Title]\nT');
      expect(prompt).toContain('[URL]\nhttps://u');
      expect(prompt).toContain('[Body (one chunk)]\n본문');
      expect(prompt).toContain('{"winners": [{"name": "company name"');
    });
  });

  describe('extractPageWithLlm', () => {
    it('normalizes model winners, agency and reasons', async () => {
      const capability = vi.fn(
        () =>
          '```json\n{"winners": [{"name": "㈜한빛시스템", "amount": "12억원"}, "가나다전자", {"name": "제안요청서"}], "agency": "조달청", "reasons": ["기술 점수 우수", 3]}\n```',
      );

      const result = await extractPageWithLlm(capability, page('낙찰자 안내'), { retryPolicy: noDelay });

      expect(capability).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        winners: [
          { name: '한빛시스템', amount: '12억원' },
          { name: '가나다전자', amount: null },
        ],
        reasons: ['기술 점수 우수'],
        agency: '조달청',
      });
    });

    it('treats blank amounts as missing', async () => {
      const capability = () => '{"winners": [{"name": "가나다전자", "amount": "  "}]}';
      const result = await extractPageWithLlm(capability, page('x'), { retryPolicy: noDelay });
      expect(result.winners).toEqual([{ name: '가나다전자', amount: null }]);
    });

    it('falls back to pattern extraction when the model finds no winners', async () => {
      const capability = { chat: vi.fn(() => ({ message: { content: '{"winners": [], "agency": "", "reasons": []}' } })) };

      const result = await extractPageWithLlm(capability, page('낙찰업체: 가나다전자'), { retryPolicy: noDelay });

      expect(result).toEqual({
        winners: [{ name: '가나다전자', amount: null }],
        reasons: ['낙찰업체: 가나다전자'],
        agency: null,
      });
    });

    it('falls back when every attempt fails', async () => {
      const invoke = vi.fn(() => {
        throw new Error('connection refused');
      });
      const events: LogEvent[] = [];

      const result = await extractPageWithLlm({ invoke }, page('낙찰업체: 가나다전자'), {
        retryPolicy: noDelay,
        log: (event) => events.push(event),
      });

      expect(invoke).toHaveBeenCalledTimes(3);
      expect(result.winners).toEqual([{ name: '가나다전자', amount: null }]);
      expect(events.some((e) => e.level === 'warn' && e.message === 'Completion failed after 3 attempts')).toBe(
        true,
      );
    });

    it('keeps going when a chunk returns unparseable output', async () => {
      const replies = ['not json at all', '{"winners": ["다온정보통신"], "agency": "공단", "reasons": []}'];
      const capability = vi.fn(() => replies.shift() ?? '');
      const config = createExtractionConfig({ chunkSize: 12 });

      const result = await extractPageWithLlm(capability, page('첫째 문단입니다\n\n둘째 문단입니다'), {
        config,
        retryPolicy: noDelay,
      });

      expect(capability).toHaveBeenCalledTimes(2);
      expect(result).toEqual({
        winners: [{ name: '다온정보통신', amount: null }],
        reasons: [],
        agency: '공단',
      });
    });

    it('votes the most frequent agency across chunks', async () => {
      const replies = [
        '{"winners": ["가나다전자"], "agency": "공단"}',
        '{"winners": ["가나다전자"], "agency": "조달청"}',
        '{"winners": [], "agency": "조달청"}',
      ];
      const capability = vi.fn(() => replies.shift() ?? '');
      const config = createExtractionConfig({ chunkSize: 5 });

      const result = await extractPageWithLlm(capability, page('문단하나\n\n문단둘\n\n문단셋'), {
        config,
        retryPolicy: noDelay,
      });

      expect(capability).toHaveBeenCalledTimes(3);
      expect(result.agency).toBe('조달청');
      expect(result.winners).toEqual([{ name: '가나다전자', amount: null }]);
    });
  });
});
