/**
 * Cross-document aggregation of per-page extraction results into ranked signals.
 */

import type {
  AggregateSignals,
  AmountValue,
  ExtractionResult,
  LegacyWinner,
} from '@bidsignal/schemas';
import { extractCandidates } from './candidate-extractor.js';
import { defaultExtractionConfig, type ExtractionConfig } from './config.js';
import { FrequencyCounter } from './frequency-counter.js';

export interface AggregationOutput {
  signals: AggregateSignals;
  winners: LegacyWinner[];
  /** True when the combined-text fallback seeded the winner counter */
  usedGlobalFallback: boolean;
}

/**
 * Numeric value of an amount. Strings keep only digits and '.', so
 * "1,200,000,000원" becomes 1200000000; unit words are not scaled.
 */
export function parseAmount(value: AmountValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const digits = value.replace(/[^\d.]/g, '');
  if (!digits) return null;
  const parsed = Number(digits);
  return Number.isFinite(parsed) ? parsed : null;
}

function average(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Merge per-page results. When no page produced a winner, the deterministic
 * extractor runs once over `combinedText` and seeds the counters.
 */
export function aggregateExtractions(
  results: readonly ExtractionResult[],
  combinedText: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): AggregationOutput {
  const winCounter = new FrequencyCounter<string>();
  const amountBag = new Map<string, number[]>();
  const reasons: string[] = [];
  const agencyCounter = new FrequencyCounter<string>();

  const recordAmount = (name: string, amount: AmountValue | undefined): void => {
    const parsed = parseAmount(amount);
    if (parsed === null) return;
    const bag = amountBag.get(name) ?? [];
    bag.push(parsed);
    amountBag.set(name, bag);
  };

  for (const result of results) {
    for (const winner of result.winners) {
      if (!winner.name) continue;
      winCounter.add(winner.name);
      recordAmount(winner.name, winner.amount);
    }
    reasons.push(...result.reasons);
    if (result.agency) agencyCounter.add(result.agency);
  }

  let usedGlobalFallback = false;
  if (winCounter.size === 0 && combinedText.trim()) {
    const fallback = extractCandidates(combinedText, config);
    for (const winner of fallback.winners) {
      winCounter.add(winner.name);
      recordAmount(winner.name, winner.amount);
    }
    if (reasons.length === 0) reasons.push(...fallback.reasons);
    if (fallback.agency) agencyCounter.add(fallback.agency);
    usedGlobalFallback = fallback.winners.length > 0;
  }

  const reasonCounter = new FrequencyCounter<string>();
  for (const reason of reasons) {
    const trimmed = reason.trim();
    if (trimmed) reasonCounter.add(trimmed);
  }

  return {
    signals: {
      topWinners: winCounter.mostCommon(config.maxTopWinners).map(([name, wins]) => ({
        name,
        wins,
        avgAmount: average(amountBag.get(name) ?? []),
      })),
      topReasons: reasonCounter
        .mostCommon(config.maxTopReasons)
        .map(([reason, freq]) => ({ reason, freq })),
      agencies: agencyCounter
        .mostCommon(config.maxAgencies)
        .map(([name, freq]) => ({ name, freq })),
    },
    winners: winCounter
      .mostCommon(config.maxLegacyWinners)
      .map(([name, count]) => ({ name, count })),
    usedGlobalFallback,
  };
}
