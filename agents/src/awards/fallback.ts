/**
 * Fallback Orchestrator - when to run the deterministic extractor behind the
 * model path, and how the two results combine.
 *
 * Precedence: the primary (model) value wins unless it is absent.
 *   winners  primary first, then fallback; duplicate names keep the first entry
 *   reasons  primary list, or the fallback list when the primary one is empty
 *   agency   primary agency, or the fallback agency when the primary has none
 */

import type { ExtractionResult, WinnerEntry } from '@bidsignal/schemas';

export function emptyExtraction(): ExtractionResult {
  return { winners: [], reasons: [], agency: null };
}

export function needsFallback(result: ExtractionResult): boolean {
  return result.winners.length === 0;
}

export function dedupeWinners(winners: readonly WinnerEntry[]): WinnerEntry[] {
  const seen = new Set<string>();
  const unique: WinnerEntry[] = [];
  for (const winner of winners) {
    if (!winner.name || seen.has(winner.name)) continue;
    seen.add(winner.name);
    unique.push(winner);
  }
  return unique;
}

export function mergeWithFallback(
  primary: ExtractionResult,
  fallback: ExtractionResult,
): ExtractionResult {
  return {
    winners: dedupeWinners([...primary.winners, ...fallback.winners]),
    reasons: primary.reasons.length > 0 ? primary.reasons : fallback.reasons,
    agency: primary.agency || fallback.agency || null,
  };
}
