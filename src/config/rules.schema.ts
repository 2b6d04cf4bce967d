import { z } from 'zod';
import { ASSESSMENT_CATEGORIES, QUESTION_KINDS } from '../risk-assessment/interfaces/risk-assessment.interface';

const scoreStepSchema = z.object({
  at_least: z.number(),
  score: z.number().min(0).max(100),
});

export const questionSchema = z
  .object({
    id: z.string().min(1),
    question: z.string().min(1),
    type: z.enum(QUESTION_KINDS),
    min: z.number().optional(),
    max: z.number().optional(),
    weight: z.number().min(0).default(1),
    reverse_score: z.boolean().default(false),
    steps: z.array(scoreStepSchema).optional(),
  })
  .superRefine((question, ctx) => {
    if (question.steps && question.type !== 'number') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['steps'],
        message: `steps only apply to number questions, "${question.id}" is ${question.type}`,
      });
    }
    if (question.type === 'boolean') {
      return;
    }
    if (question.type === 'number' && (question.min === undefined || question.max === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `number question "${question.id}" needs both min and max`,
      });
      return;
    }
    const min = question.min ?? 1;
    const max = question.max ?? 5;
    if (min >= max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `question "${question.id}" has min (${min}) >= max (${max})`,
      });
    }
  });

export const rulesDocumentSchema = z
  .object({
    hard_stops: z.object({
      max_consecutive_losses: z.number().int().min(0),
      max_daily_loss_percent: z.number().min(0),
      min_sleep_hours: z.number().min(0),
      psychology_min_score: z.number(),
      require_clear_bias: z.boolean().default(false),
    }),
    questions: z.object({
      psychology: z.array(questionSchema),
      market_conditions: z.array(questionSchema),
      technical_confluence: z.array(questionSchema),
    }),
    scoring: z.object({
      weights: z.record(z.string(), z.number().min(0)),
      thresholds: z
        .object({
          no_trade: z.number().default(50),
          risk_2_percent: z.number().default(70),
        })
        .default({}),
    }),
    lot_calculation: z
      .object({
        pip_values: z.record(z.string(), z.number().positive()).default({}),
        min_lot_size: z.number().positive().default(0.01),
        max_lot_size: z.number().positive().default(10),
      })
      .default({}),
    coach: z
      .object({
        days_inactive_warning: z.number().int().min(1).default(3),
        motivational_messages: z.array(z.string()).default([]),
        daily_motivations: z.array(z.string()).optional(),
      })
      .default({}),
  })
  .superRefine((doc, ctx) => {
    const { no_trade, risk_2_percent } = doc.scoring.thresholds;
    if (no_trade >= risk_2_percent) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scoring', 'thresholds'],
        message: `no_trade (${no_trade}) must be below risk_2_percent (${risk_2_percent})`,
      });
    }

    const { min_lot_size, max_lot_size } = doc.lot_calculation;
    if (min_lot_size > max_lot_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lot_calculation'],
        message: `min_lot_size (${min_lot_size}) exceeds max_lot_size (${max_lot_size})`,
      });
    }

    const seen = new Set<string>();
    for (const category of ASSESSMENT_CATEGORIES) {
      for (const question of doc.questions[category]) {
        if (seen.has(question.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['questions', category],
            message: `duplicate question id "${question.id}"`,
          });
        }
        seen.add(question.id);
      }
    }
  });

export type RulesDocument = z.infer<typeof rulesDocumentSchema>;
export type QuestionDocument = z.infer<typeof questionSchema>;
