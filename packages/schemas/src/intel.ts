import { z } from 'zod';
import { evidenceItemSchema } from './page.js';

export const awardRecordSchema = z.object({
  noticeId: z.string(),
  title: z.string(),
  agency: z.string(),
  winner: z.string(),
  amount: z.number().nullable(),
  openDate: z.string().nullable(),
  topicTags: z.array(z.string()).max(8),
  url: z.string(),
});

export type AwardRecord = z.infer<typeof awardRecordSchema>;

export const competitorSchema = z.object({
  name: z.string(),
  wins: z.number().int().positive(),
  avgAmount: z.number().nullable(),
});

export type Competitor = z.infer<typeof competitorSchema>;

export const marketLandscapeSchema = z.object({
  concentrationIndex: z.number().min(0).max(1),
  query: z.string(),
});

export type MarketLandscape = z.infer<typeof marketLandscapeSchema>;

export const competitorIntelSchema = z.object({
  topCompetitors: z.array(competitorSchema).max(5),
  marketLandscape: marketLandscapeSchema,
  evidences: z.array(evidenceItemSchema),
  awards: z.array(awardRecordSchema),
});

export type CompetitorIntel = z.infer<typeof competitorIntelSchema>;
