import { z } from 'zod';

export const pageRecordSchema = z.object({
  url: z.string().catch(''),
  title: z.string().catch(''),
  text: z.string().catch(''),
});

export type PageRecord = z.infer<typeof pageRecordSchema>;

export const pageListSchema = z.array(z.unknown()).catch([]);

export const evidenceItemSchema = z.object({
  url: z.string(),
  title: z.string(),
  snippet: z.string().max(260),
});

export type EvidenceItem = z.infer<typeof evidenceItemSchema>;

export const pageBatchInputSchema = z.object({
  pages: pageListSchema,
  query: z.string().catch(''),
});

export type PageBatchInput = z.infer<typeof pageBatchInputSchema>;
