/**
 * Competitor Intel Agent
 *
 * Builds a lightweight market summary straight from result pages, without the
 * model path:
 * - keeps pages that read like award / bid-opening results
 * - pulls winner, amount and opening date from labelled fields
 * - ranks competitors by wins, then by average award amount
 * - scores market competitiveness from keyword frequency
 */

import {
  competitorIntelSchema,
  pageBatchInputSchema,
  pageListSchema,
  pageRecordSchema,
  type AwardRecord,
  type Competitor,
  type CompetitorIntel,
  type EvidenceItem,
  type PageBatchInput,
} from '@bidsignal/schemas';
import type { LogFn } from '@bidsignal/llm';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import { defaultExtractionConfig, type ExtractionConfig } from '../awards/config.js';
import { FrequencyCounter } from '../awards/frequency-counter.js';
import { cleanPageText, truncate } from '../awards/text-normalizer.js';
import { normalizeCompanyName } from '../awards/validators.js';

const WINNER_PATTERN = /(?:낙찰자|낙찰업체|낙찰\s*사)\s*[:：]\s*([\p{L}\p{N}_\-()&·㈜ \t]+)/u;
const TITLE_WINNER_PATTERN = /낙찰\s*(?:자|업체|사)\s*[:：]?\s*([\p{L}\p{N}_\-()&·㈜ \t]{2,})/u;
const AMOUNT_PATTERN = /(?:낙찰금액|계약금액|금액)\s*[:：]\s*([0-9,]+)\s*(?:원|KRW)?/;
const DATE_PATTERN = /(?:개찰일|계약일|발표일)\s*[:：]\s*(\d{4}[./-]\d{1,2}[./-]\d{1,2})/;

export interface AwardFields {
  winner: string;
  amount: number | null;
  openDate: string | null;
}

/**
 * `YYYY-MM-DD` for a real calendar date, otherwise the input with `.` and `/`
 * turned into `-`.
 */
export function normalizeOpenDate(raw: string): string {
  const dashed = raw.replace(/[./]/g, '-');
  const parts = dashed.split('-').map(Number);
  if (parts.length !== 3) return dashed;

  const [year, month, day] = parts;
  const date = new Date(Date.UTC(year, month - 1, day));
  const valid =
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
  if (!valid) return dashed;

  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function parseDigits(raw: string): number | null {
  const digits = raw.replace(/,/g, '');
  if (!digits) return null;
  const value = Number(digits);
  return Number.isFinite(value) ? value : null;
}

/**
 * Winner (body label, then title), amount and opening date from labelled fields.
 * The winner is returned as written; callers normalize it.
 */
export function extractAwardFields(title: string, text: string): AwardFields {
  const winnerMatch = WINNER_PATTERN.exec(text) ?? TITLE_WINNER_PATTERN.exec(title);
  const amountMatch = AMOUNT_PATTERN.exec(text);
  const dateMatch = DATE_PATTERN.exec(text);

  return {
    winner: winnerMatch ? winnerMatch[1].trim() : '',
    amount: amountMatch ? parseDigits(amountMatch[1]) : null,
    openDate: dateMatch ? normalizeOpenDate(dateMatch[1]) : null,
  };
}

/**
 * First line near the top of the body that mentions an institution-like token.
 */
export function guessAgency(
  text: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): string {
  const lines = text.split('\n').slice(0, config.agencyScanLines);
  for (const line of lines) {
    if (config.institutionKeywords.some((keyword) => line.includes(keyword))) {
      return line.trim().slice(0, config.agencyMaxLength);
    }
  }
  return '';
}

export function tagsFromTitle(
  title: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): string[] {
  const tokens = title
    .replace(/\[[^\]]+\]/g, ' ')
    .split(/[\s/·:,]+/)
    .filter((token) => token.length >= 2 && !/^\d+$/.test(token));
  return [...new Set(tokens)].slice(0, config.maxTopicTags);
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from >= 0) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Competition keyword occurrences across all texts, scaled into [0, 1].
 */
export function computeConcentrationIndex(
  texts: readonly string[],
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
): number {
  const corpus = texts.join(' ');
  const signal = config.competitionKeywords.reduce(
    (sum, keyword) => sum + countOccurrences(corpus, keyword),
    0,
  );
  if (config.concentrationNormalizer <= 0) return signal > 0 ? 1 : 0;
  return Math.min(1, signal / config.concentrationNormalizer);
}

function isAwardContext(haystack: string, config: Readonly<ExtractionConfig>): boolean {
  return config.awardContextKeywords.some((keyword) => haystack.includes(keyword));
}

function rankCompetitors(awards: readonly AwardRecord[], limit: number): Competitor[] {
  const wins = new FrequencyCounter<string>();
  const amounts = new Map<string, number[]>();

  for (const award of awards) {
    if (!award.winner) continue;
    wins.add(award.winner);
    if (award.amount !== null && award.amount > 0) {
      const bag = amounts.get(award.winner) ?? [];
      bag.push(award.amount);
      amounts.set(award.winner, bag);
    }
  }

  const ranked: Competitor[] = wins.mostCommon().map(([name, count]) => {
    const bag = amounts.get(name) ?? [];
    return {
      name,
      wins: count,
      avgAmount: bag.length > 0 ? bag.reduce((sum, v) => sum + v, 0) / bag.length : null,
    };
  });

  ranked.sort((a, b) => b.wins - a.wins || (b.avgAmount ?? 0) - (a.avgAmount ?? 0));
  return ranked.slice(0, limit);
}

export function buildCompetitorIntel(
  pages: unknown,
  query: string,
  config: Readonly<ExtractionConfig> = defaultExtractionConfig,
  log?: LogFn,
): CompetitorIntel {
  const awards: AwardRecord[] = [];
  const evidences: EvidenceItem[] = [];
  const texts: string[] = [];

  for (const raw of pageListSchema.parse(pages)) {
    const parsed = pageRecordSchema.safeParse(raw);
    if (!parsed.success) continue;

    const url = parsed.data.url.trim();
    const title = parsed.data.title.trim();

    let text: string;
    try {
      text = cleanPageText(parsed.data.text, config);
    } catch (err) {
      log?.({
        level: 'warn',
        message: `Skipping page ${url || '(no url)'}`,
        data: err instanceof Error ? err.message : String(err),
      });
      continue;
    }
    if (!text.trim()) continue;
    texts.push(text);

    if (!isAwardContext(`${title}\n${text}`, config)) continue;

    const fields = extractAwardFields(title, text);
    awards.push({
      noticeId: title.slice(0, 50),
      title,
      agency: guessAgency(text, config),
      winner: normalizeCompanyName(fields.winner, config) ?? '',
      amount: fields.amount,
      openDate: fields.openDate,
      topicTags: tagsFromTitle(title, config),
      url,
    });
    evidences.push({ url, title, snippet: truncate(text, config.snippetLength) });
  }

  return {
    topCompetitors: rankCompetitors(awards, config.maxTopCompetitors),
    marketLandscape: {
      concentrationIndex: computeConcentrationIndex(texts, config),
      query,
    },
    evidences: evidences.slice(0, config.maxIntelEvidences),
    awards,
  };
}

export class CompetitorIntelAgent extends BaseAgent<PageBatchInput, CompetitorIntel> {
  config: AgentConfig = {
    name: 'CompetitorIntelAgent',
    description: 'Ranks competing bidders and scores market competitiveness from award pages',
    version: '1.0.0',
  };

  inputSchema = pageBatchInputSchema;
  outputSchema = competitorIntelSchema;

  constructor(private readonly extraction: Readonly<ExtractionConfig> = defaultExtractionConfig) {
    super();
  }

  protected async run(input: PageBatchInput, _context: AgentContext): Promise<CompetitorIntel> {
    this.info(`Building competitor intel from ${input.pages.length} page(s)`, {
      query: input.query,
    });
    const intel = buildCompetitorIntel(input.pages, input.query, this.extraction, this.logSink);
    this.debug('Competitor intel built', {
      awards: intel.awards.length,
      competitors: intel.topCompetitors.length,
      concentrationIndex: intel.marketLandscape.concentrationIndex,
    });
    return intel;
  }
}
