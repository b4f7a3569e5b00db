/**
 * Deterministic Candidate Extractor - pattern matching plus a plausibility
 * score over one cleaned text.
 *
 * Used when the model path is unavailable or returns no winners, and as the
 * only path for competitor intel. Total: never throws, empty in -> empty out.
 */

import type { AmountValue, ExtractionResult } from '@bidsignal/schemas';
import { defaultExtractionConfig, type ExtractionConfig } from './config.js';
import { clean, truncate } from './text-normalizer.js';
import {
  escapeRegExp,
  hasCompanyHint,
  hasCorporateMarker,
  isNumberLike,
  normalizeCompanyName,
} from './validators.js';

export type Span = readonly [start: number, end: number];

export interface EntityCandidate {
  name: string;
  amount: AmountValue;
  score: number;
  /** Position of the raw name in the text */
  sourceSpan: Span;
}

interface CompiledPatterns {
  keywordFirst: RegExp;
  labelFirst: RegExp;
  keywordThenName: RegExp;
  nameThenKeyword: RegExp;
  amount: RegExp;
  agency: RegExp;
}

interface RawMatch {
  raw: string;
  rawStart: number;
  keywordSpan: Span;
}

const NAME_CHARS = '[가-힣A-Za-z0-9&.\\-·() ]';
const SEPARATOR = '\\s*[:：\\-–]?\\s*';
const SENTENCE_BOUNDARY = /[\n.!?。]+/;

const compiled = new WeakMap<object, CompiledPatterns>();

function alternation(words: readonly string[]): string {
  // longest first so "낙찰 업체" wins over a shorter prefix
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

function compile(config: Readonly<ExtractionConfig>): CompiledPatterns {
  const cached = compiled.get(config);
  if (cached) return cached;

  const markers = alternation(config.corporateMarkers);
  const name = `(?:(?:${markers})\\s*)?${NAME_CHARS}{2,60}`;
  const winner = alternation(config.winnerKeywords);
  const label = alternation(config.companyLabelKeywords);
  const gap = config.proximityWindow;

  const patterns: CompiledPatterns = {
    keywordFirst: new RegExp(`(${winner})${SEPARATOR}(${name})`, 'g'),
    labelFirst: new RegExp(`(${label})${SEPARATOR}(${name})`, 'g'),
    keywordThenName: new RegExp(`(${winner})[^\\n]{0,${gap}}?(${name})`, 'g'),
    nameThenKeyword: new RegExp(`(${name})[^\\n]{0,${gap}}?(${winner})`, 'g'),
    amount: new RegExp(
      `(?:${alternation(config.amountKeywords)})${SEPARATOR}([0-9][0-9,.]*(?:\\s*(?:${alternation(config.amountUnits)}))?)`,
      'g',
    ),
    agency: new RegExp(`(?:${alternation(config.agencyKeywords)})${SEPARATOR}(${NAME_CHARS}{2,60})`),
  };

  compiled.set(config, patterns);
  return patterns;
}

/** Matches where the keyword precedes the name (keyword in group 1, name in group 2). */
function keywordLeadingMatches(pattern: RegExp, text: string): RawMatch[] {
  const matches: RawMatch[] = [];
  for (const m of text.matchAll(pattern)) {
    const start = m.index ?? 0;
    const keyword = m[1];
    const raw = m[2];
    matches.push({
      raw,
      rawStart: start + m[0].length - raw.length,
      keywordSpan: [start, start + keyword.length],
    });
  }
  return matches;
}

/** Matches where the name precedes the keyword (name in group 1, keyword in group 2). */
function nameLeadingMatches(pattern: RegExp, text: string): RawMatch[] {
  const matches: RawMatch[] = [];
  for (const m of text.matchAll(pattern)) {
    const start = m.index ?? 0;
    const raw = m[1];
    const keyword = m[2];
    const keywordStart = start + m[0].length - keyword.length;
    matches.push({
      raw,
      rawStart: start,
      keywordSpan: [keywordStart, keywordStart + keyword.length],
    });
  }
  return matches;
}

/**
 * Plausibility score for one raw candidate:
 * +2 corporate hint, +1 space or corporate marker, -2 long spaceless token
 * without hint, +1 when the candidate sits within the window around the
 * keyword. -Infinity when the name does not normalize.
 */
export function scoreCandidate(
  raw: string,
  context: string,
  keywordSpan: Span,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): number {
  const normalized = normalizeCompanyName(raw, config);
  if (!normalized) return Number.NEGATIVE_INFINITY;

  let score = 0;
  if (hasCompanyHint(raw, config) || hasCompanyHint(normalized, config)) score += 2;
  if (normalized.includes(' ') || hasCorporateMarker(raw, config)) score += 1;
  if (!normalized.includes(' ') && normalized.length >= 16 && !hasCompanyHint(normalized, config)) {
    score -= 2;
  }

  const from = Math.max(0, keywordSpan[0] - config.proximityWindow);
  const to = Math.min(context.length, keywordSpan[1] + config.proximityWindow);
  const nearby = context.slice(from, to);
  const trimmed = raw.trim();
  if ((trimmed && nearby.includes(trimmed)) || nearby.includes(normalized)) score += 1;

  return score;
}

function assignAmounts(
  text: string,
  candidates: EntityCandidate[],
  config: Readonly<ExtractionConfig>,
  pattern: RegExp,
): void {
  if (candidates.length === 0) return;

  for (const m of text.matchAll(pattern)) {
    const amount = m[1].trim();
    if (!isNumberLike(amount, config)) continue;

    const position = m.index ?? 0;
    // stable sort: equal distances keep iteration order
    const nearest = [...candidates]
      .sort(
        (a, b) => Math.abs(position - a.sourceSpan[0]) - Math.abs(position - b.sourceSpan[0]),
      )
      .slice(0, 3);
    const target = nearest.find((c) => c.amount === null || c.amount === '');
    if (target) target.amount = amount;
  }
}

/**
 * Every scored candidate that clears the noise threshold, in match order,
 * with amounts attached.
 */
export function collectCandidates(
  text: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): EntityCandidate[] {
  const cleaned = clean(text);
  if (!cleaned.trim()) return [];

  const patterns = compile(config);
  const matches = [
    ...keywordLeadingMatches(patterns.keywordFirst, cleaned),
    ...keywordLeadingMatches(patterns.labelFirst, cleaned),
    ...keywordLeadingMatches(patterns.keywordThenName, cleaned),
    ...nameLeadingMatches(patterns.nameThenKeyword, cleaned),
  ];

  const candidates: EntityCandidate[] = [];
  for (const match of matches) {
    const score = scoreCandidate(match.raw, cleaned, match.keywordSpan, config);
    if (score < config.minCandidateScore) continue;

    const name = normalizeCompanyName(match.raw, config);
    if (!name) continue;

    candidates.push({
      name,
      amount: null,
      score,
      sourceSpan: [match.rawStart, match.rawStart + match.raw.length],
    });
  }

  assignAmounts(cleaned, candidates, config, patterns.amount);
  return candidates;
}

function extractAgency(text: string, config: Readonly<ExtractionConfig>): string | null {
  const m = compile(config).agency.exec(text);
  return m ? normalizeCompanyName(m[1], config) : null;
}

/**
 * Sentences mentioning a reason keyword, truncated and deduplicated.
 */
export function extractReasons(
  text: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): string[] {
  const reasons: string[] = [];
  for (const sentence of clean(text).split(SENTENCE_BOUNDARY)) {
    const trimmed = sentence.trim();
    if (!trimmed) continue;
    if (!config.reasonKeywords.some((k) => trimmed.includes(k))) continue;

    const reason = truncate(trimmed, config.reasonMaxLength);
    if (reason && !reasons.includes(reason)) reasons.push(reason);
    if (reasons.length >= config.maxCandidateReasons) break;
  }
  return reasons;
}

function compareCandidates(a: EntityCandidate, b: EntityCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Recover winners, reasons and agency from one text without a model.
 */
export function extractCandidates(
  text: unknown,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): ExtractionResult {
  const cleaned = clean(text);
  if (!cleaned.trim()) return { winners: [], reasons: [], agency: null };

  const ranked = collectCandidates(cleaned, config).sort(compareCandidates);

  const winners: ExtractionResult['winners'] = [];
  const byName = new Map<string, ExtractionResult['winners'][number]>();
  for (const candidate of ranked) {
    const kept = byName.get(candidate.name);
    if (kept) {
      if (kept.amount === null && candidate.amount !== null) kept.amount = candidate.amount;
      continue;
    }
    const entry = { name: candidate.name, amount: candidate.amount };
    byName.set(candidate.name, entry);
    winners.push(entry);
  }

  return {
    winners: winners.slice(0, config.maxCandidateWinners),
    reasons: extractReasons(cleaned, config),
    agency: extractAgency(cleaned, config),
  };
}
