/**
 * Award snapshot - page list in, ranked award signals out.
 *
 * Each page goes through the model path (with deterministic fallback) when a
 * completion capability is available, or straight through the deterministic
 * extractor when it is not. A page that throws is logged and skipped.
 */

import {
  createCompletionCapability,
  defaultRetryPolicy,
  type CompletionCapability,
  type LogFn,
  type RetryPolicy,
} from '@bidsignal/llm';
import {
  pageListSchema,
  pageRecordSchema,
  type AwardSnapshot,
  type EvidenceItem,
  type ExtractionResult,
} from '@bidsignal/schemas';
import { aggregateExtractions } from './aggregator.js';
import { extractCandidates } from './candidate-extractor.js';
import { defaultExtractionConfig, type ExtractionConfig } from './config.js';
import { extractPageWithLlm } from './llm-extractor.js';
import { cleanPageText, truncate } from './text-normalizer.js';

export const UNAVAILABLE_NOTE = 'unavailable';

export interface AwardSnapshotOptions {
  /**
   * Completion capability for the model path. Omit to build one from the
   * environment; pass null to run deterministic-only.
   */
  capability?: CompletionCapability | null;
  config?: Readonly<ExtractionConfig>;
  retryPolicy?: RetryPolicy;
  log?: LogFn;
}

function resolveCapability(
  options: AwardSnapshotOptions,
  log: LogFn | undefined,
): CompletionCapability | null {
  if (options.capability !== undefined) return options.capability;
  try {
    return createCompletionCapability();
  } catch (err) {
    log?.({
      level: 'warn',
      message: 'Could not construct completion capability',
      data: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

export async function buildAwardSnapshot(
  pages: unknown,
  query: string,
  options: AwardSnapshotOptions = {},
): Promise<AwardSnapshot> {
  const config = options.config ?? defaultExtractionConfig;
  const retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
  const log = options.log;

  const capability = resolveCapability(options, log);
  if (!capability) {
    log?.({ level: 'warn', message: 'Completion capability unavailable; deterministic extraction only' });
  }

  const results: ExtractionResult[] = [];
  const evidences: EvidenceItem[] = [];
  const texts: string[] = [];

  for (const raw of pageListSchema.parse(pages)) {
    const parsed = pageRecordSchema.safeParse(raw);
    if (!parsed.success) continue;

    const url = parsed.data.url.trim();
    const title = parsed.data.title.trim();

    try {
      const text = cleanPageText(parsed.data.text, config);
      if (!text.trim()) continue;
      texts.push(text);

      const result = capability
        ? await extractPageWithLlm(capability, { url, title, text }, { config, retryPolicy, log })
        : extractCandidates(text, config);
      results.push(result);
      evidences.push({ url, title, snippet: truncate(text, config.snippetLength) });
    } catch (err) {
      log?.({
        level: 'warn',
        message: `Skipping page ${url || '(no url)'}`,
        data: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const aggregated = aggregateExtractions(results, texts.join('\n\n'), config);
  if (aggregated.usedGlobalFallback) {
    log?.({ level: 'info', message: 'Winners recovered from combined page text' });
  }

  const snapshot: AwardSnapshot = {
    query,
    winners: aggregated.winners,
    signals: aggregated.signals,
    evidences: evidences.slice(0, config.maxEvidences),
    score: { tech: null, price: null, total: null },
  };
  if (!capability) snapshot.note = UNAVAILABLE_NOTE;

  log?.({
    level: 'debug',
    message: `Snapshot built: ${snapshot.winners.length} winner(s), ${snapshot.evidences.length} evidence item(s)`,
  });
  return snapshot;
}

export { buildAwardSnapshot as extract };
