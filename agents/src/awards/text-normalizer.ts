/**
 * Text Normalizer - whitespace / invisible-character cleanup, display
 * truncation and markup stripping for page bodies.
 */

import { parse } from 'node-html-parser';
import { parseLooseJson } from '@bidsignal/llm';
import { defaultExtractionConfig, type ExtractionConfig } from './config.js';

export { parseLooseJson };

const INVISIBLE_CHARS = /[\u200b\u200c\u200d\u2060\ufeff]/g;
const MARKUP_HINT = /<\/?[a-z][a-z0-9-]*(?:\s[^<>]*)?\/?>/i;
const NON_TEXT_TAGS = 'script, style, noscript, svg, template, iframe';

/**
 * Remove zero-width/BOM characters, turn non-breaking spaces into spaces,
 * collapse horizontal whitespace runs and 3+ newlines. Idempotent.
 */
export function clean(text: unknown): string {
  if (typeof text !== 'string' || !text) return '';
  return text
    .replace(INVISIBLE_CHARS, '')
    .replace(/&nbsp;/gi, ' ')
    .replace(/\u00a0/g, ' ')
    .replace(/\r\n?/g, '\n')
    .replace(/[^\S\n]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n');
}

/**
 * Single-line display form: whitespace collapsed, hard-cut to `n - 3` chars plus '...'.
 */
export function truncate(text: unknown, n: number = 260): string {
  const flat = clean(text).split(/\s+/).filter(Boolean).join(' ');
  if (flat.length <= n) return flat;
  return `${flat.slice(0, Math.max(0, n - 3))}...`;
}

export function looksLikeMarkup(text: string): boolean {
  return MARKUP_HINT.test(text);
}

/**
 * Convert an HTML body to block-separated text. Plain text is returned unchanged.
 */
export function htmlToText(text: string): string {
  if (!looksLikeMarkup(text)) return text;

  const root = parse(text, {
    comment: false,
    blockTextElements: {
      script: false,
      noscript: false,
      style: false,
      pre: true,
    },
  });

  for (const el of root.querySelectorAll(NON_TEXT_TAGS)) {
    el.remove();
  }

  return root.structuredText;
}

/**
 * The cleaned body every extractor works on.
 */
export function cleanPageText(
  text: unknown,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): string {
  if (typeof text !== 'string') return '';
  return clean(config.stripMarkup ? htmlToText(text) : text);
}
