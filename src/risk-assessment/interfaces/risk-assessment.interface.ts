export const ASSESSMENT_CATEGORIES = ['psychology', 'market_conditions', 'technical_confluence'] as const;

export type AssessmentCategory = (typeof ASSESSMENT_CATEGORIES)[number];

export const QUESTION_KINDS = ['boolean', 'scale', 'number'] as const;

export type QuestionKind = (typeof QUESTION_KINDS)[number];

export type RawAnswer = boolean | number;

/** Answers keyed by question id. */
export type Answers = Readonly<Record<string, RawAnswer>>;

export interface ScoreStep {
  atLeast: number;
  score: number;
}

export interface QuestionSpec {
  id: string;
  text: string;
  category: AssessmentCategory;
  kind: QuestionKind;
  min?: number;
  max?: number;
  weight: number;
  reverseScore: boolean;
  steps?: readonly ScoreStep[];
}

export interface TradingStats {
  consecutiveLosses: number;
  dailyLossPercent: number;
}

export interface TradeDetails {
  balance: number;
  slPips: number;
  instrument: string;
}

export interface HardStopThresholds {
  maxConsecutiveLosses: number;
  maxDailyLossPercent: number;
  minSleepHours: number;
  psychologyMinScore: number;
  requireClearBias: boolean;
}

export interface ScoreThresholds {
  noTrade: number;
  risk2Percent: number;
}

export interface LotLimits {
  minLotSize: number;
  maxLotSize: number;
}

export type CategoryWeights = Readonly<Partial<Record<AssessmentCategory, number>>>;
