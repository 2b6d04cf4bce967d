import { z } from 'zod';
import { tradeDetailsSchema, tradingStatsSchema } from '../../risk-assessment/dto/evaluate-request.dto';

export const startSessionSchema = z.object({
  stats: tradingStatsSchema.default({}),
});

export const sessionReplySchema = z.object({
  reply: z.string(),
});

export const sessionEvaluateSchema = z.object({
  tradeDetails: tradeDetailsSchema.optional(),
});

export const sessionJournalSchema = z.object({
  notes: z.string().max(2000).default(''),
});

export type StartSessionRequest = z.infer<typeof startSessionSchema>;
export type SessionReplyRequest = z.infer<typeof sessionReplySchema>;
export type SessionEvaluateRequest = z.infer<typeof sessionEvaluateSchema>;
export type SessionJournalRequest = z.infer<typeof sessionJournalSchema>;
