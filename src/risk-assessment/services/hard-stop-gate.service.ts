import { Injectable, Logger } from '@nestjs/common';
import { RuleConfigService } from './rule-config.service';
import { HardStopOutcome } from '../dto/risk-decision.dto';
import { Answers, HardStopThresholds, TradingStats } from '../interfaces/risk-assessment.interface';

export const SLEEP_QUESTION_ID = 'sleep_quality';
export const MENTAL_STATE_QUESTION_ID = 'mental_state';
export const CLEAR_BIAS_QUESTION_ID = 'clear_bias';

interface HardStopContext {
  answers: Answers;
  stats: Partial<TradingStats>;
  limits: HardStopThresholds;
}

interface HardStopCheck {
  id: string;
  /** Returns the failure line, or null when the check passes. */
  evaluate(context: HardStopContext): string | null;
}

const numericAnswer = (answers: Answers, id: string): number => {
  const value = answers[id];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
};

export const HARD_STOP_CHECKS: readonly HardStopCheck[] = [
  {
    id: 'consecutive_losses',
    evaluate: ({ stats, limits }) => {
      const losses = stats.consecutiveLosses ?? 0;
      return losses >= limits.maxConsecutiveLosses
        ? `Consecutive losses (${losses}) >= ${limits.maxConsecutiveLosses}`
        : null;
    },
  },
  {
    id: 'daily_loss',
    evaluate: ({ stats, limits }) => {
      const loss = stats.dailyLossPercent ?? 0;
      return loss >= limits.maxDailyLossPercent
        ? `Daily loss (${loss}%) >= ${limits.maxDailyLossPercent}%`
        : null;
    },
  },
  {
    id: 'sleep',
    evaluate: ({ answers, limits }) => {
      const hours = numericAnswer(answers, SLEEP_QUESTION_ID);
      return hours < limits.minSleepHours ? `Sleep hours (${hours}) < ${limits.minSleepHours}` : null;
    },
  },
  {
    id: 'mental_state',
    evaluate: ({ answers, limits }) => {
      const state = numericAnswer(answers, MENTAL_STATE_QUESTION_ID);
      return state < limits.psychologyMinScore
        ? `Mental state (${state}) < ${limits.psychologyMinScore}`
        : null;
    },
  },
  {
    id: 'clear_bias',
    evaluate: ({ answers, limits }) =>
      limits.requireClearBias && answers[CLEAR_BIAS_QUESTION_ID] !== true ? 'No clear market bias' : null,
  },
];

@Injectable()
export class HardStopGateService {
  private readonly logger = new Logger(HardStopGateService.name);

  constructor(private ruleConfig: RuleConfigService) {}

  /**
   * Runs every check so that all failures are reported together.
   * Missing stats or answers count as 0 / false.
   */
  evaluate(answers: Answers, stats: Partial<TradingStats>): HardStopOutcome {
    const context: HardStopContext = { answers, stats, limits: this.ruleConfig.hardStopThresholds() };

    const failedChecks: string[] = [];
    for (const check of HARD_STOP_CHECKS) {
      const failure = check.evaluate(context);
      if (failure !== null) {
        failedChecks.push(failure);
      }
    }

    if (failedChecks.length === 0) {
      return { passed: true, failedChecks };
    }

    this.logger.warn(`Hard stops triggered: ${failedChecks.length}`);
    return {
      passed: false,
      failedChecks,
      reason: `Hard stops failed: ${failedChecks.join('; ')}`,
    };
  }
}
