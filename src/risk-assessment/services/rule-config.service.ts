import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../../common/errors';
import { RULES_CONFIG_KEY } from '../../config/rules.config';
import { QuestionDocument, RulesDocument } from '../../config/rules.schema';
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  CategoryWeights,
  HardStopThresholds,
  LotLimits,
  QuestionSpec,
  ScoreThresholds,
} from '../interfaces/risk-assessment.interface';

export const DEFAULT_PIP_VALUE = 10;

export interface CoachSettings {
  daysInactiveWarning: number;
  motivationalMessages: readonly string[];
  dailyMotivations?: readonly string[];
}

/**
 * Typed, read-only view over the rule document loaded by ConfigModule.
 * Everything is resolved once in the constructor; lookups never touch storage.
 */
@Injectable()
export class RuleConfigService {
  private readonly logger = new Logger(RuleConfigService.name);
  private readonly rules: RulesDocument;
  private readonly questionsByCategory: ReadonlyMap<AssessmentCategory, readonly QuestionSpec[]>;
  private readonly questionsById: ReadonlyMap<string, QuestionSpec>;

  constructor(private configService: ConfigService) {
    const rules = this.configService.get<RulesDocument>(RULES_CONFIG_KEY);
    if (!rules) {
      throw new ConfigurationError(`Rule config "${RULES_CONFIG_KEY}" has not been loaded`);
    }
    this.rules = rules;

    const byCategory = new Map<AssessmentCategory, readonly QuestionSpec[]>();
    const byId = new Map<string, QuestionSpec>();
    for (const category of ASSESSMENT_CATEGORIES) {
      const specs = rules.questions[category].map((doc) => Object.freeze(toQuestionSpec(doc, category)));
      byCategory.set(category, Object.freeze(specs));
      specs.forEach((spec) => byId.set(spec.id, spec));
    }
    this.questionsByCategory = byCategory;
    this.questionsById = byId;

    this.logger.log(
      `Rules loaded: ${byId.size} questions, thresholds ${JSON.stringify(this.scoreThresholds())}`,
    );
  }

  hardStopThresholds(): HardStopThresholds {
    const hardStops = this.rules.hard_stops;
    return {
      maxConsecutiveLosses: hardStops.max_consecutive_losses,
      maxDailyLossPercent: hardStops.max_daily_loss_percent,
      minSleepHours: hardStops.min_sleep_hours,
      psychologyMinScore: hardStops.psychology_min_score,
      requireClearBias: hardStops.require_clear_bias,
    };
  }

  questions(category: AssessmentCategory): readonly QuestionSpec[] {
    return this.questionsByCategory.get(category) ?? [];
  }

  allQuestions(): QuestionSpec[] {
    return ASSESSMENT_CATEGORIES.flatMap((category) => this.questions(category));
  }

  question(id: string): QuestionSpec | undefined {
    return this.questionsById.get(id);
  }

  categoryWeights(): CategoryWeights {
    const weights: Partial<Record<AssessmentCategory, number>> = {};
    for (const category of ASSESSMENT_CATEGORIES) {
      weights[category] = this.rules.scoring.weights[category] ?? 0;
    }
    return weights;
  }

  scoreThresholds(): ScoreThresholds {
    const { no_trade, risk_2_percent } = this.rules.scoring.thresholds;
    return { noTrade: no_trade, risk2Percent: risk_2_percent };
  }

  /** Case-insensitive; unknown instruments fall back to DEFAULT_PIP_VALUE. */
  pipValue(instrument: string): number {
    const wanted = instrument.trim().toUpperCase();
    const pipValues = this.rules.lot_calculation.pip_values;
    const key = Object.keys(pipValues).find((candidate) => candidate.toUpperCase() === wanted);
    return key === undefined ? DEFAULT_PIP_VALUE : pipValues[key];
  }

  lotLimits(): LotLimits {
    const { min_lot_size, max_lot_size } = this.rules.lot_calculation;
    return { minLotSize: min_lot_size, maxLotSize: max_lot_size };
  }

  coachSettings(): CoachSettings {
    const coach = this.rules.coach;
    return {
      daysInactiveWarning: coach.days_inactive_warning,
      motivationalMessages: coach.motivational_messages,
      dailyMotivations: coach.daily_motivations,
    };
  }
}

function toQuestionSpec(doc: QuestionDocument, category: AssessmentCategory): QuestionSpec {
  const spec: QuestionSpec = {
    id: doc.id,
    text: doc.question,
    category,
    kind: doc.type,
    weight: doc.weight,
    reverseScore: doc.reverse_score,
  };
  if (doc.type === 'scale') {
    spec.min = doc.min ?? 1;
    spec.max = doc.max ?? 5;
  } else if (doc.type === 'number') {
    spec.min = doc.min;
    spec.max = doc.max;
  }
  if (doc.steps) {
    spec.steps = doc.steps.map((step) => ({ atLeast: step.at_least, score: step.score }));
  }
  return spec;
}
