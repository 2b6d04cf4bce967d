import { AssessmentCategory, RawAnswer } from '../interfaces/risk-assessment.interface';

export interface AnswerRecord {
  readonly questionId: string;
  readonly questionText: string;
  readonly rawAnswer: RawAnswer;
  readonly category: AssessmentCategory;
  readonly weight: number;
  readonly normalizedScore: number;
}

export interface HardStopOutcome {
  readonly passed: boolean;
  readonly failedChecks: readonly string[];
  readonly reason?: string;
}

export type CategoryScores = Readonly<Partial<Record<AssessmentCategory, number>>>;

export interface RiskDecision {
  readonly shouldTrade: boolean;
  readonly riskPercent: number;
  readonly finalScore: number;
  readonly categoryScores: CategoryScores;
  readonly answers: readonly AnswerRecord[];
  readonly hardStopOutcome: HardStopOutcome;
  readonly lotSize: number | null;
  readonly timestamp: string;
}
