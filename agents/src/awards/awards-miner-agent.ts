import type { CompletionCapability } from '@bidsignal/llm';
import {
  awardSnapshotSchema,
  pageBatchInputSchema,
  type AwardSnapshot,
  type PageBatchInput,
} from '@bidsignal/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../shared/types.js';
import { buildAwardSnapshot } from './award-snapshot.js';
import { defaultExtractionConfig, type ExtractionConfig } from './config.js';

export interface AwardsMinerOptions {
  /** Omit to build from the environment; null forces deterministic-only */
  capability?: CompletionCapability | null;
  extraction?: Readonly<ExtractionConfig>;
  retryDelayMs?: number;
}

export class AwardsMinerAgent extends BaseAgent<PageBatchInput, AwardSnapshot> {
  config: AgentConfig = {
    name: 'AwardsMinerAgent',
    description: 'Aggregates award winners, reasons and agencies from procurement result pages',
    version: '1.0.0',
    retries: 2,
  };

  inputSchema = pageBatchInputSchema;
  outputSchema = awardSnapshotSchema;

  constructor(private readonly options: AwardsMinerOptions = {}) {
    super();
  }

  protected async run(input: PageBatchInput, _context: AgentContext): Promise<AwardSnapshot> {
    this.info(`Mining awards from ${input.pages.length} page(s)`, { query: input.query });

    const snapshot = await buildAwardSnapshot(input.pages, input.query, {
      capability: this.options.capability,
      config: this.options.extraction ?? defaultExtractionConfig,
      retryPolicy: this.retryPolicy(this.options.retryDelayMs),
      log: this.logSink,
    });

    this.info('Award snapshot complete', {
      winners: snapshot.winners.length,
      evidences: snapshot.evidences.length,
      note: snapshot.note,
    });
    return snapshot;
  }
}
