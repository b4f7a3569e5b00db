import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  extractJson,
  findBalancedObject,
  jsonFixers,
  parseJsonResponse,
  parseLooseJson,
} from '@bidsignal/llm';

describe('parse', () => {
  describe('jsonFixers', () => {
    it('unwraps a fenced json block', () => {
      expect(jsonFixers.stripCodeFences('Here:\n```json\n{"a": 1}\n```\nthanks')).toBe('{"a": 1}');
    });

    it('removes trailing commas before closing brackets', () => {
      expect(jsonFixers.removeTrailingCommas('{"a": [1, 2,], "b": 3,}')).toBe('{"a": [1, 2], "b": 3}');
    });
  });

  describe('findBalancedObject', () => {
    it('ignores braces inside string values', () => {
      expect(findBalancedObject('x {"a": "}"} y')).toBe('{"a": "}"}');
    });

    it('returns the outermost nested object', () => {
      expect(findBalancedObject('pre {"a": {"b": 2}} post {"c": 3}')).toBe('{"a": {"b": 2}}');
    });

    it('returns null when nothing balances', () => {
      expect(findBalancedObject('{"a": 1')).toBeNull();
    });
  });

  describe('extractJson', () => {
    it('returns null when there is no object', () => {
      expect(extractJson('no json here')).toBeNull();
    });
  });

  describe('parseLooseJson', () => {
    it('recovers an object from fenced output with a trailing comma', () => {
      expect(parseLooseJson('Sure! ```json\n{"a": 1,}\n```')).toEqual({ a: 1 });
    });

    it('recovers an object surrounded by prose', () => {
      expect(parseLooseJson('prefix {"a": {"b": 2}} trailing')).toEqual({ a: { b: 2 } });
    });

    it('returns an empty object for arrays, non-strings and garbage', () => {
      expect(parseLooseJson('[1, 2]')).toEqual({});
      expect(parseLooseJson(42)).toEqual({});
      expect(parseLooseJson('   ')).toEqual({});
      expect(parseLooseJson('{"a": nope}')).toEqual({});
    });
  });

  describe('parseJsonResponse', () => {
    const schema = z.object({ n: z.number() });

    it('validates recovered JSON against the schema', () => {
      const result = parseJsonResponse('```\n{"n": 3}\n```', schema);
      expect(result.success).toBe(true);
      expect(result.data).toEqual({ n: 3 });
    });

    it('reports validation issues with their path', () => {
      const result = parseJsonResponse('{"n": "x"}', schema);
      expect(result.success).toBe(false);
      expect(result.error).toBe('Validation failed: n: Expected number, received string');
    });

    it('reports missing JSON', () => {
      const result = parseJsonResponse('nothing', schema);
      expect(result).toEqual({ success: false, error: 'No JSON object found', rawResponse: 'nothing' });
    });
  });
});
