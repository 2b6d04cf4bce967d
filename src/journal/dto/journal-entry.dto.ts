import { z } from 'zod';
import {
  rawAnswerSchema,
  tradeDetailsSchema,
  tradingStatsSchema,
} from '../../risk-assessment/dto/evaluate-request.dto';

export const journalDecisionSchema = z.object({
  shouldTrade: z.boolean(),
  riskPercent: z.number(),
  finalScore: z.number(),
  categoryScores: z.record(z.string(), z.number()),
  hardStopsPassed: z.boolean(),
  failedChecks: z.array(z.string()),
});

export const journalEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string().datetime(),
  answers: z.record(z.string(), rawAnswerSchema),
  stats: tradingStatsSchema,
  decision: journalDecisionSchema,
  tradeDetails: tradeDetailsSchema.nullable(),
  lotSize: z.number().nullable(),
  notes: z.string(),
});

export type JournalDecision = z.infer<typeof journalDecisionSchema>;
export type JournalEntry = z.infer<typeof journalEntrySchema>;

export const createJournalEntrySchema = z.object({
  answers: z.record(z.string(), rawAnswerSchema),
  stats: tradingStatsSchema.default({}),
  tradeDetails: tradeDetailsSchema.optional(),
  notes: z.string().max(2000).default(''),
});

export type CreateJournalEntryRequest = z.infer<typeof createJournalEntrySchema>;

export interface JournalQuery {
  limit?: number;
  tradedOnly?: boolean;
}

export interface JournalStats {
  periodDays: number;
  totalSessions: number;
  tradesTaken: number;
  avgScore: number;
  tradeRate: number;
  risk2PercentCount: number;
  risk3PercentCount: number;
}
