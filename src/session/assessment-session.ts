import { ValidationError } from '../common/errors';
import { RiskDecision } from '../risk-assessment/dto/risk-decision.dto';
import {
  QuestionSpec,
  RawAnswer,
  TradeDetails,
  TradingStats,
} from '../risk-assessment/interfaces/risk-assessment.interface';

const YES_REPLIES = ['y', 'yes', 's', 'si', 'sí'];
const NO_REPLIES = ['n', 'no'];
const DECIMAL_REPLY = /^-?\d+(\.\d+)?$/;

/**
 * State of one questionnaire conversation. Each session owns its answers;
 * nothing here is shared between sessions.
 */
export class AssessmentSession {
  readonly answers: Record<string, RawAnswer> = {};
  tradeDetails?: TradeDetails;
  lastDecision?: RiskDecision;
  lastTouchedAt: number;
  private position = 0;

  constructor(
    readonly id: string,
    readonly stats: TradingStats,
    private readonly questions: readonly QuestionSpec[],
    now: number = Date.now(),
  ) {
    this.lastTouchedAt = now;
  }

  touch(now: number = Date.now()): void {
    this.lastTouchedAt = now;
  }

  idleFor(now: number): number {
    return now - this.lastTouchedAt;
  }

  currentQuestion(): QuestionSpec | undefined {
    return this.questions[this.position];
  }

  isComplete(): boolean {
    return this.position >= this.questions.length;
  }

  progress(): { answered: number; total: number } {
    return { answered: this.position, total: this.questions.length };
  }

  /**
   * Records the reply to the current question and moves on. A reply that
   * cannot be parsed leaves the session where it was.
   */
  submit(reply: string): RawAnswer {
    const question = this.currentQuestion();
    if (!question) {
      throw new ValidationError('All questions have already been answered');
    }

    const value = parseReply(question, reply);
    this.answers[question.id] = value;
    this.position += 1;
    return value;
  }
}

export function parseReply(question: QuestionSpec, reply: string): RawAnswer {
  const text = reply.trim().toLowerCase();

  if (question.kind === 'boolean') {
    if (YES_REPLIES.includes(text)) return true;
    if (NO_REPLIES.includes(text)) return false;
    throw new ValidationError(`Please answer yes or no`, [`${question.id}: "${reply}" is not yes/no`]);
  }

  const value = DECIMAL_REPLY.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new ValidationError('Please enter a valid number', [`${question.id}: "${reply}" is not a number`]);
  }

  const min = question.min ?? Number.NEGATIVE_INFINITY;
  const max = question.max ?? Number.POSITIVE_INFINITY;
  if (value < min || value > max) {
    throw new ValidationError(`The value must be between ${min} and ${max}`, [
      `${question.id}: ${value} is outside [${min}, ${max}]`,
    ]);
  }

  return question.kind === 'scale' ? Math.trunc(value) : value;
}
