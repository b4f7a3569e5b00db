/**
 * Name/Value Validators - company-name plausibility filter and amount check.
 *
 * Every winner or agency name, from either extraction path, goes through
 * `normalizeCompanyName` before it is counted.
 */

import { defaultExtractionConfig, type ExtractionConfig } from './config.js';
import { clean } from './text-normalizer.js';

const LEGAL_SUFFIX =
  /[\s,]*\b(?:co\.?,?\s*ltd\.?|inc\.?|corp\.?|corporation|ltd\.?|llc|l\.l\.c\.)$/i;
const EDGE_PUNCTUATION = /^[\s,.;:·|[\]-]+|[\s,.;:·|[\]-]+$/g;
const HAS_LETTER = /[가-힣A-Za-z]/;
const ALNUM = /[\p{L}\p{N}]/u;
const MIN_ALNUM_DENSITY = 0.6;
const LONG_TOKEN_LENGTH = 16;

const markerPatterns = new WeakMap<readonly string[], RegExp>();

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function markerPattern(markers: readonly string[]): RegExp {
  let pattern = markerPatterns.get(markers);
  if (!pattern) {
    pattern = new RegExp(`\\s*(?:${markers.map(escapeRegExp).join('|')})\\s*`, 'g');
    markerPatterns.set(markers, pattern);
  }
  return pattern;
}

export function hasCompanyHint(
  name: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): boolean {
  return config.companyHints.some((hint) => name.includes(hint));
}

export function hasCorporateMarker(
  name: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): boolean {
  return config.corporateMarkers.some((marker) => name.includes(marker));
}

/** Drop edge punctuation, and an edge parenthesis only when it has no partner. */
function trimEdges(name: string): string {
  let result = name.replace(EDGE_PUNCTUATION, '');
  if (result.startsWith('(') && !result.includes(')')) result = result.slice(1);
  if (result.endsWith(')') && !result.includes('(')) result = result.slice(0, -1);
  return result.replace(EDGE_PUNCTUATION, '');
}

function alnumDensity(name: string): number {
  const chars = Array.from(name);
  const alnum = chars.filter((ch) => ALNUM.test(ch)).length;
  return alnum / Math.max(1, chars.length);
}

/**
 * Clean a raw company-name candidate, or return null when it does not look
 * like an organization name.
 */
export function normalizeCompanyName(
  raw: unknown,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): string | null {
  if (typeof raw !== 'string' || !raw) return null;

  let name = clean(raw).replace(/\s+/g, ' ').trim();
  name = name.replace(markerPattern(config.corporateMarkers), '').replace(/\s+/g, ' ').trim();
  name = name.replace(LEGAL_SUFFIX, '');
  name = trimEdges(name);

  if (name.length < 2) return null;

  const lower = name.toLowerCase();
  if (config.banTokens.some((token) => lower.includes(token.toLowerCase()))) return null;

  if (!HAS_LETTER.test(name)) return null;

  // one long run with no space is usually a captured sentence fragment
  if (!name.includes(' ') && name.length >= LONG_TOKEN_LENGTH && !hasCompanyHint(name, config)) {
    return null;
  }

  if (alnumDensity(name) < MIN_ALNUM_DENSITY) return null;

  if (config.particles.includes(name)) return null;

  return name;
}

/**
 * True when the string carries a digit or a currency/unit token.
 */
export function isNumberLike(
  value: unknown,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): boolean {
  if (typeof value !== 'string') return false;
  if (/\d/.test(value)) return true;
  return config.amountUnits.some((unit) => value.includes(unit));
}
