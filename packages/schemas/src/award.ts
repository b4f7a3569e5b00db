import { z } from 'zod';
import { evidenceItemSchema } from './page.js';

export const amountValueSchema = z.union([z.number(), z.string()]).nullable();
export type AmountValue = z.infer<typeof amountValueSchema>;

export const winnerEntrySchema = z.object({
  name: z.string().min(1),
  amount: amountValueSchema.default(null),
});

export type WinnerEntry = z.infer<typeof winnerEntrySchema>;

export const extractionResultSchema = z.object({
  winners: z.array(winnerEntrySchema).default([]),
  reasons: z.array(z.string()).default([]),
  agency: z.string().nullable().default(null),
});

export type ExtractionResult = z.infer<typeof extractionResultSchema>;

export const topWinnerSchema = z.object({
  name: z.string(),
  wins: z.number().int().nonnegative(),
  avgAmount: z.number().nullable(),
});

export type TopWinner = z.infer<typeof topWinnerSchema>;

export const aggregateSignalsSchema = z.object({
  topWinners: z.array(topWinnerSchema).max(8),
  topReasons: z.array(z.object({ reason: z.string(), freq: z.number().int() })).max(8),
  agencies: z.array(z.object({ name: z.string(), freq: z.number().int() })).max(6),
});

export type AggregateSignals = z.infer<typeof aggregateSignalsSchema>;

export const legacyWinnerSchema = z.object({
  name: z.string(),
  count: z.number().int(),
});

export type LegacyWinner = z.infer<typeof legacyWinnerSchema>;

export const awardScoreSchema = z.object({
  tech: z.number().nullable(),
  price: z.number().nullable(),
  total: z.number().nullable(),
});

export const awardSnapshotSchema = z.object({
  query: z.string(),
  winners: z.array(legacyWinnerSchema).max(5),
  signals: aggregateSignalsSchema,
  evidences: z.array(evidenceItemSchema).max(20),
  score: awardScoreSchema,
  note: z.string().optional(),
});

export type AwardSnapshot = z.infer<typeof awardSnapshotSchema>;
