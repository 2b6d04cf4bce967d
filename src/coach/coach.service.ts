import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import * as techIndicators from 'technicalindicators';
import { JournalService } from '../journal/journal.service';
import { RuleConfigService } from '../risk-assessment/services/rule-config.service';
import {
  DEFAULT_DAILY_MOTIVATIONS,
  PSYCHOLOGY_ANSWER_IDS,
  RANDOM_SOURCE,
  RandomSource,
} from './coach.constants';
import { CoachInsights } from './dto/coach-insights.dto';

/**
 * Reads the journal and turns recent sessions into coaching hints.
 */
@Injectable()
export class CoachService {
  private readonly logger = new Logger(CoachService.name);

  constructor(
    private journalService: JournalService,
    private ruleConfig: RuleConfigService,
    @Inject(RANDOM_SOURCE) private random: RandomSource,
  ) {}

  checkInactivity(now: Date = new Date()): string | null {
    const daysInactive = this.journalService.daysSinceLastTrade(now);
    if (daysInactive === null) {
      return null;
    }

    const { daysInactiveWarning, motivationalMessages } = this.ruleConfig.coachSettings();
    if (daysInactive < daysInactiveWarning) {
      return null;
    }

    if (motivationalMessages.length > 0) {
      return this.pick(motivationalMessages).split('{days}').join(String(daysInactive));
    }
    return `You have gone ${daysInactive} days without trading. How about reviewing the market?`;
  }

  analyzePsychologyPattern(): string | null {
    const entries = this.journalService.getEntries({ limit: 7 });
    if (entries.length < 3) {
      return null;
    }

    const scores: number[] = [];
    for (const entry of entries) {
      for (const id of PSYCHOLOGY_ANSWER_IDS) {
        const value = entry.answers[id];
        if (typeof value === 'number') {
          scores.push(value);
        }
      }
    }
    if (scores.length === 0) {
      return null;
    }

    const average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
    if (average < 3) {
      return 'Your mental state has been low lately. Consider taking a break or talking to someone.';
    }
    if (average < 3.5) {
      return 'Your psychology has been uneven. You may need a more consistent routine before trading.';
    }
    return null;
  }

  analyzeRiskTakingPattern(): string | null {
    const entries = this.journalService.getEntries({ limit: 10, tradedOnly: true });
    if (entries.length < 5) {
      return null;
    }

    const fullRiskCount = entries.filter((entry) => entry.decision.riskPercent === 3).length;
    const fullRiskShare = (fullRiskCount / entries.length) * 100;

    if (fullRiskShare > 80) {
      return 'You are taking 3% risk on most trades. Make sure the confluences are really there.';
    }
    if (fullRiskShare < 20) {
      return 'You have been very conservative lately. Check that your criteria are not too strict to take good setups.';
    }
    return null;
  }

  /**
   * Compares the 3-session moving average at the start and at the end of the
   * last ten sessions.
   */
  analyzeScoreTrend(): string | null {
    const entries = this.journalService.getEntries({ limit: 10 });
    if (entries.length < 5) {
      return null;
    }

    const scores = entries.map((entry) => entry.decision.finalScore);
    const averages = techIndicators.SMA.calculate({ period: 3, values: scores });
    const oldAverage = averages[0];
    const recentAverage = averages[averages.length - 1];

    if (recentAverage < oldAverage - 10) {
      return 'Your scores have been falling. Review your analysis or take a break.';
    }
    if (recentAverage > oldAverage + 10) {
      return 'Your scores are improving. Keep refining your process.';
    }
    return null;
  }

  analyzeHardStopTriggers(): string | null {
    const entries = this.journalService.getEntries({ limit: 10 });
    if (entries.length < 5) {
      return null;
    }

    const failed = entries.filter((entry) => !entry.decision.hardStopsPassed);
    if (failed.length > entries.length * 0.3) {
      return 'Hard stops are blocking you often. The system is protecting you, but work on the areas that keep stopping you.';
    }
    return null;
  }

  dailyMotivation(): string {
    const configured = this.ruleConfig.coachSettings().dailyMotivations;
    return this.pick(configured && configured.length > 0 ? configured : DEFAULT_DAILY_MOTIVATIONS);
  }

  getInsights(now: Date = new Date()): CoachInsights {
    const insights: CoachInsights = {
      dailyMotivation: this.dailyMotivation(),
      generatedAt: now.toISOString(),
    };

    const inactivityWarning = this.checkInactivity(now);
    if (inactivityWarning) insights.inactivityWarning = inactivityWarning;

    const psychologyInsight = this.analyzePsychologyPattern();
    if (psychologyInsight) insights.psychologyInsight = psychologyInsight;

    const riskTakingInsight = this.analyzeRiskTakingPattern();
    if (riskTakingInsight) insights.riskTakingInsight = riskTakingInsight;

    const scoreTrendInsight = this.analyzeScoreTrend();
    if (scoreTrendInsight) insights.scoreTrendInsight = scoreTrendInsight;

    const hardStopInsight = this.analyzeHardStopTriggers();
    if (hardStopInsight) insights.hardStopInsight = hardStopInsight;

    return insights;
  }

  weeklyReport(now: Date = new Date()): string {
    const stats = this.journalService.getStats(7, now);
    const insights = this.getInsights(now);
    const rule = '='.repeat(60);

    const report = [
      rule,
      'WEEKLY REPORT',
      rule,
      '',
      'Summary:',
      `  - Sessions completed: ${stats.totalSessions}`,
      `  - Trades taken: ${stats.tradesTaken}`,
      `  - Average score: ${stats.avgScore}/100`,
      `  - Trade rate: ${stats.tradeRate}%`,
      '',
      'Risk distribution:',
      `  - 2% risk: ${stats.risk2PercentCount} trades`,
      `  - 3% risk: ${stats.risk3PercentCount} trades`,
      '',
      'Coach insights:',
    ];

    const hints = [
      insights.psychologyInsight,
      insights.riskTakingInsight,
      insights.scoreTrendInsight,
      insights.hardStopInsight,
    ];
    for (const hint of hints) {
      if (hint) {
        report.push(`  - ${hint}`);
      }
    }

    report.push('', insights.dailyMotivation, rule);
    return report.join('\n');
  }

  @Cron(CronExpression.EVERY_DAY_AT_9AM)
  remindIfInactive() {
    const warning = this.checkInactivity();
    if (warning) {
      this.logger.warn(warning);
    }
  }

  private pick(messages: readonly string[]): string {
    const index = Math.min(messages.length - 1, Math.floor(this.random() * messages.length));
    return messages[index];
  }
}
