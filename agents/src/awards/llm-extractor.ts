/**
 * LLM Extractor - award extraction through a completion capability.
 *
 * Responsibilities:
 * - Split long bodies into paragraph-aligned chunks
 * - Ask the model for a fixed JSON shape per chunk (with bounded retry)
 * - Recover and validate loose JSON, normalize names, vote on the agency
 * - Fall back to the deterministic extractor when a page yields no winners
 *
 * LLM Usage: Heavy (one call per chunk)
 */

import { z } from 'zod';
import {
  createPromptTemplate,
  defaultRetryPolicy,
  parseJsonResponse,
  renderPrompt,
  sendWithRetry,
  structuredExtractionSystem,
  type CompletionCapability,
  type LogFn,
  type RetryPolicy,
} from '@bidsignal/llm';
import type { AmountValue, ExtractionResult, PageRecord, WinnerEntry } from '@bidsignal/schemas';
import { extractCandidates } from './candidate-extractor.js';
import { defaultExtractionConfig, type ExtractionConfig } from './config.js';
import { dedupeWinners, mergeWithFallback, needsFallback } from './fallback.js';
import { FrequencyCounter } from './frequency-counter.js';
import { clean, truncate } from './text-normalizer.js';
import { normalizeCompanyName } from './validators.js';

export interface LlmExtractionOptions {
  config?: Readonly<ExtractionConfig>;
  retryPolicy?: RetryPolicy;
  log?: LogFn;
}

const llmWinnerSchema = z.object({
  name: z.string().catch(''),
  amount: z.union([z.string(), z.number()]).nullable().catch(null),
});

const llmChunkSchema = z.object({
  winners: z.array(z.unknown()).catch([]),
  agency: z.string().catch(''),
  reasons: z.array(z.unknown()).catch([]),
});

export type LlmChunkOutput = z.infer<typeof llmChunkSchema>;

const AWARD_PROMPT = createPromptTemplate(
  `The text below comes from a Korean public-procurement result or award notice.
Find the winning bidder (낙찰자 / 낙찰업체 / 우선협상대상자 / 계약상대자), the contracting agency
(발주기관 / 수요기관) if stated, the award amount if stated, and short phrases giving the reason
or basis for the award.

Respond with JSON only, in exactly this shape:
{"winners": [{"name": "company name", "amount": "amount with its original unit"}], "agency": "agency name or empty string", "reasons": ["short reason phrase"]}

Rules:
- Use only information present in the text; leave a field empty rather than guessing.
- "winners" holds real organization names only, never sentence fragments or labels.
- Keep amounts in the unit written in the text.

[Title]
{title}

[URL]
{url}

[Body (one chunk)]
{body}`,
  {
    system: structuredExtractionSystem(
      'pull award winners, agency, amounts and award reasons out of procurement notices',
    ),
  },
);

/**
 * Split a body on blank-line paragraph boundaries into chunks of at most
 * `maxLength` characters. A paragraph longer than the limit becomes its own chunk.
 */
export function chunkText(body: string, maxLength: number = defaultExtractionConfig.chunkSize): string[] {
  const text = clean(body);
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let current = '';
  for (const paragraph of text.split(/\n{2,}/)) {
    if (!paragraph.trim()) continue;
    const joinedLength = current ? current.length + 2 + paragraph.length : paragraph.length;
    if (joinedLength <= maxLength) {
      current = current ? `${current}\n\n${paragraph}` : paragraph;
    } else {
      if (current) chunks.push(current);
      current = paragraph;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export function buildChunkPrompt(input: { title: string; url: string; body: string }): string {
  return renderPrompt(AWARD_PROMPT, input);
}

function toAmount(value: AmountValue): AmountValue {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  return value;
}

function readWinner(item: unknown, config: Readonly<ExtractionConfig>): WinnerEntry | null {
  if (typeof item === 'string') {
    const name = normalizeCompanyName(item, config);
    return name ? { name, amount: null } : null;
  }
  const parsed = llmWinnerSchema.safeParse(item);
  if (!parsed.success) return null;
  const name = normalizeCompanyName(parsed.data.name, config);
  return name ? { name, amount: toAmount(parsed.data.amount) } : null;
}

/**
 * Extract one page through the capability. `page.text` should already be cleaned.
 */
export async function extractPageWithLlm(
  capability: CompletionCapability,
  page: PageRecord,
  options: LlmExtractionOptions = {},
): Promise<ExtractionResult> {
  const config = options.config ?? defaultExtractionConfig;
  const retryPolicy = options.retryPolicy ?? defaultRetryPolicy;
  const log = options.log;

  const chunks = chunkText(page.text, config.chunkSize);
  const winners: WinnerEntry[] = [];
  const reasons: string[] = [];
  const agencyVotes = new FrequencyCounter<string>();

  for (const [index, chunk] of chunks.entries()) {
    const label = `chunk ${index + 1}/${chunks.length}`;
    try {
      const prompt = buildChunkPrompt({ title: page.title, url: page.url, body: chunk });
      const raw = await sendWithRetry(capability, prompt, retryPolicy, log);
      if (!raw) continue;

      const parsed = parseJsonResponse(raw, llmChunkSchema);
      if (!parsed.success || !parsed.data) {
        log?.({ level: 'debug', message: `${label}: unusable model output`, data: parsed.error });
        continue;
      }

      for (const item of parsed.data.winners) {
        const winner = readWinner(item, config);
        if (winner) winners.push(winner);
      }
      for (const item of parsed.data.reasons) {
        if (typeof item !== 'string' || !item.trim()) continue;
        reasons.push(truncate(item.trim(), config.reasonMaxLength));
      }
      const agency = normalizeCompanyName(parsed.data.agency, config);
      if (agency) agencyVotes.add(agency);

      log?.({
        level: 'debug',
        message: `${label}: ${winners.length} winner(s) so far`,
        data: { url: page.url },
      });
    } catch (err) {
      log?.({
        level: 'warn',
        message: `${label} failed for ${page.url}`,
        data: err instanceof Error ? err.message : String(err),
      });
    }
  }

  const primary: ExtractionResult = {
    winners: dedupeWinners(winners),
    reasons,
    agency: agencyVotes.mostCommon(1)[0]?.[0] ?? null,
  };

  if (!needsFallback(primary)) return primary;

  const fallback = extractCandidates(page.text, config);
  log?.({
    level: 'info',
    message: `Model returned no winners; deterministic fallback found ${fallback.winners.length}`,
    data: { url: page.url },
  });
  return mergeWithFallback(primary, fallback);
}
