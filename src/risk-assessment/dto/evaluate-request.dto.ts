import { z } from 'zod';

export const rawAnswerSchema = z.union([z.boolean(), z.number().finite()]);

export const tradingStatsSchema = z.object({
  consecutiveLosses: z.number().int().min(0).default(0),
  dailyLossPercent: z.number().min(0).max(100).default(0),
});

export const tradeDetailsSchema = z.object({
  balance: z.number().positive(),
  slPips: z.number().positive(),
  instrument: z.string().trim().min(1),
});

export const evaluateRequestSchema = z.object({
  answers: z.record(z.string(), rawAnswerSchema),
  stats: tradingStatsSchema.default({}),
  tradeDetails: tradeDetailsSchema.optional(),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;
