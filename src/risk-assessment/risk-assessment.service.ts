import { Injectable, Logger } from '@nestjs/common';
import { deepFreeze } from '../common/deep-freeze';
import { HardStopGateService } from './services/hard-stop-gate.service';
import { ScoreEngineService } from './services/score-engine.service';
import { RiskDeciderService } from './services/risk-decider.service';
import { RuleConfigService } from './services/rule-config.service';
import { RiskDecision } from './dto/risk-decision.dto';
import {
  AssessmentCategory,
  Answers,
  QuestionSpec,
  TradeDetails,
  TradingStats,
} from './interfaces/risk-assessment.interface';

@Injectable()
export class RiskAssessmentService {
  private readonly logger = new Logger(RiskAssessmentService.name);

  constructor(
    private ruleConfig: RuleConfigService,
    private hardStopGate: HardStopGateService,
    private scoreEngine: ScoreEngineService,
    private riskDecider: RiskDeciderService,
  ) {}

  /**
   * Gate, score, decide, size. Nothing is cached: calling again with the same
   * answers and stats (for example to add trade details) recomputes the same
   * gate and scores.
   */
  evaluate(answers: Answers, stats: Partial<TradingStats>, tradeDetails?: TradeDetails): RiskDecision {
    const hardStopOutcome = this.hardStopGate.evaluate(answers, stats);

    if (!hardStopOutcome.passed) {
      this.logger.warn(`Trading blocked: ${hardStopOutcome.reason}`);
      return deepFreeze<RiskDecision>({
        shouldTrade: false,
        riskPercent: 0,
        finalScore: 0,
        categoryScores: {},
        answers: [],
        hardStopOutcome,
        lotSize: null,
        timestamp: new Date().toISOString(),
      });
    }

    const { finalScore, categoryScores, answers: records } = this.scoreEngine.scoreFinal(answers);
    const { shouldTrade, riskPercent } = this.riskDecider.decide(finalScore);

    let lotSize: number | null = null;
    if (shouldTrade && tradeDetails) {
      lotSize = this.riskDecider.lotSize(
        riskPercent,
        tradeDetails.balance,
        tradeDetails.slPips,
        tradeDetails.instrument,
      );
    }

    this.logger.log(
      `Score ${finalScore.toFixed(1)} | trade: ${shouldTrade} | risk: ${riskPercent}%` +
        (lotSize !== null ? ` | lots: ${lotSize}` : ''),
    );

    return deepFreeze<RiskDecision>({
      shouldTrade,
      riskPercent,
      finalScore,
      categoryScores,
      answers: records,
      hardStopOutcome,
      lotSize,
      timestamp: new Date().toISOString(),
    });
  }

  questionsByCategory(): Record<AssessmentCategory, readonly QuestionSpec[]> {
    return {
      psychology: this.ruleConfig.questions('psychology'),
      market_conditions: this.ruleConfig.questions('market_conditions'),
      technical_confluence: this.ruleConfig.questions('technical_confluence'),
    };
  }
}
