import { describe, it, expect, vi } from 'vitest';
import {
  extractResponseText,
  listInvocations,
  sendWithRetry,
  type CompletionMethods,
  type LogEvent,
} from '@bidsignal/llm';

const noDelay = { retries: 2, delayMs: 0 };

describe('capability', () => {
  describe('extractResponseText', () => {
    it.each([
      ['plain string', 'plain', 'plain'],
      ['content string', { content: 'a' }, 'a'],
      ['content parts', { content: { parts: [{ text: 'b' }] } }, 'b'],
      ['text field', { text: 'c' }, 'c'],
      ['chat choice', { choices: [{ message: { content: 'd' } }] }, 'd'],
      ['completion choice', { choices: [{ text: 'e' }] }, 'e'],
      ['ollama chat', { message: { role: 'assistant', content: 'f' } }, 'f'],
      ['ollama generate', { response: 'g', done: true }, 'g'],
    ])('reads %s', (_label, response, expected) => {
      expect(extractResponseText(response)).toBe(expected);
    });

    it('returns undefined for unknown shapes', () => {
      expect(extractResponseText({ data: 'x' })).toBeUndefined();
      expect(extractResponseText(null)).toBeUndefined();
      expect(extractResponseText({ choices: [] })).toBeUndefined();
    });

    it('uses the supplied probe chain', () => {
      const probes = [(r: unknown) => (typeof r === 'number' ? String(r) : undefined)];
      expect(extractResponseText(7, probes)).toBe('7');
      expect(extractResponseText('x', probes)).toBeUndefined();
    });
  });

  describe('listInvocations', () => {
    it('orders invoke, call, chat, generate, complete', async () => {
      const calls: string[] = [];
      const fn = Object.assign((p: string) => calls.push(`call:${p}`), {
        invoke: (p: string) => calls.push(`invoke:${p}`),
        chat: (p: string) => calls.push(`chat:${p}`),
        generate: (r: { prompt: string }) => calls.push(`generate:${r.prompt}`),
        complete: (r: { prompt: string }) => calls.push(`complete:${r.prompt}`),
      });

      for (const invocation of listInvocations(fn)) {
        await invocation('p');
      }
      expect(calls).toEqual(['invoke:p', 'call:p', 'chat:p', 'generate:p', 'complete:p']);
    });

    it('finds nothing on an empty object', () => {
      expect(listInvocations({})).toHaveLength(0);
    });
  });

  describe('sendWithRetry', () => {
    it('calls a plain function', async () => {
      await expect(sendWithRetry((p) => `${p}!`, 'hi', noDelay)).resolves.toBe('hi!');
    });

    it('passes a request object to generate and reads the ollama shape', async () => {
      const capability: CompletionMethods = {
        generate: vi.fn((request: { prompt: string }) => ({ response: request.prompt.toUpperCase() })),
      };
      await expect(sendWithRetry(capability, 'abc', noDelay)).resolves.toBe('ABC');
    });

    it('awaits async responses', async () => {
      const capability: CompletionMethods = { invoke: async () => ({ text: 'async' }) };
      await expect(sendWithRetry(capability, 'p', noDelay)).resolves.toBe('async');
    });

    it('moves to the next convention when one returns blank text', async () => {
      const invoke = vi.fn(() => '   ');
      const chat = vi.fn(() => 'from chat');
      await expect(sendWithRetry({ invoke, chat }, 'p', noDelay)).resolves.toBe('from chat');
      expect(invoke).toHaveBeenCalledTimes(1);
      expect(chat).toHaveBeenCalledTimes(1);
    });

    it('retries a failing capability until it succeeds', async () => {
      let failures = 2;
      const invoke = vi.fn(() => {
        if (failures-- > 0) throw new Error('timeout');
        return 'ok';
      });
      await expect(sendWithRetry({ invoke }, 'p', noDelay)).resolves.toBe('ok');
      expect(invoke).toHaveBeenCalledTimes(3);
    });

    it('gives up after 1 + retries attempts and logs a warning', async () => {
      const invoke = vi.fn(() => {
        throw new Error('down');
      });
      const events: LogEvent[] = [];
      const text = await sendWithRetry({ invoke }, 'p', { retries: 1, delayMs: 0 }, (e) => events.push(e));

      expect(text).toBe('');
      expect(invoke).toHaveBeenCalledTimes(2);
      expect(events.map((e) => e.level)).toEqual(['debug', 'warn']);
      expect(events[1]).toEqual({
        level: 'warn',
        message: 'Completion failed after 2 attempts',
        data: { error: 'Error: down' },
      });
    });

    it('waits the fixed delay between attempts', async () => {
      vi.useFakeTimers();
      try {
        const invoke = vi.fn(() => {
          throw new Error('down');
        });
        const pending = sendWithRetry({ invoke }, 'p', { retries: 1, delayMs: 500 });
        await vi.advanceTimersByTimeAsync(499);
        expect(invoke).toHaveBeenCalledTimes(1);
        await vi.advanceTimersByTimeAsync(1);
        await expect(pending).resolves.toBe('');
        expect(invoke).toHaveBeenCalledTimes(2);
      } finally {
        vi.useRealTimers();
      }
    });

    it('returns empty text for a capability without conventions', async () => {
      const log = vi.fn();
      await expect(sendWithRetry({}, 'p', noDelay, log)).resolves.toBe('');
      expect(log).toHaveBeenCalledWith({
        level: 'warn',
        message: 'Completion capability exposes no calling convention',
      });
    });
  });
});
