/**
 * JSON response parsing utilities for model output that is only mostly JSON:
 * code fences, leading prose, trailing commentary and trailing commas.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';

export interface ParseResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  rawResponse?: string;
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Unwrap the first ```json fenced block, if any */
  stripCodeFences: (input: string): string => {
    const fenced = input.match(/```(?:json)?\s*([\s\S]*?)```/i);
    return fenced ? fenced[1].trim() : input.trim();
  },

  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => {
    return input.replace(/,(\s*[}\]])/g, '$1');
  },
};

/**
 * Return the first `{...}` span whose braces balance, scanning string literals
 * so braces inside quoted values do not count. Null when nothing balances.
 */
export function findBalancedObject(text: string): string | null {
  let start = text.indexOf('{');

  while (start >= 0) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) return text.slice(start, i + 1);
      }
    }

    start = text.indexOf('{', start + 1);
  }

  return null;
}

/**
 * Extract the JSON object text from a response that may contain markdown
 * code blocks or surrounding prose.
 */
export function extractJson(response: string): string | null {
  const unfenced = jsonFixers.stripCodeFences(response);
  const candidate = findBalancedObject(unfenced) ?? findBalancedObject(response);
  return candidate === null ? null : jsonFixers.removeTrailingCommas(candidate);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Best-effort parse of a JSON object out of raw model output.
 * Returns an empty object on any failure; never throws.
 */
export function parseLooseJson(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'string' || !raw.trim()) return {};

  const jsonStr = extractJson(raw);
  if (jsonStr === null) return {};

  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * Parse a loose JSON response and validate it against a Zod schema.
 */
export function parseJsonResponse<T>(
  response: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): ParseResult<T> {
  const rawResponse = response;
  const jsonStr = extractJson(response);

  if (jsonStr === null) {
    return { success: false, error: 'No JSON object found', rawResponse };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON: ${message}`, rawResponse };
  }

  const validated = schema.safeParse(parsed);
  if (!validated.success) {
    return {
      success: false,
      error: `Validation failed: ${formatZodIssues(validated.error)}`,
      rawResponse,
    };
  }

  return { success: true, data: validated.data, rawResponse };
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}
