import { Injectable, Logger } from '@nestjs/common';
import { RuleConfigService } from './rule-config.service';
import { KIND_NORMALIZERS, numberCurveFor } from './normalizers';
import { AnswerRecord, CategoryScores } from '../dto/risk-decision.dto';
import {
  ASSESSMENT_CATEGORIES,
  AssessmentCategory,
  Answers,
  QuestionSpec,
  RawAnswer,
} from '../interfaces/risk-assessment.interface';

export interface CategoryResult {
  score: number;
  answers: AnswerRecord[];
}

export interface FinalScoreResult {
  finalScore: number;
  categoryScores: CategoryScores;
  answers: AnswerRecord[];
}

@Injectable()
export class ScoreEngineService {
  private readonly logger = new Logger(ScoreEngineService.name);

  constructor(private ruleConfig: RuleConfigService) {}

  normalize(spec: QuestionSpec, raw: RawAnswer): number {
    if (spec.kind === 'number' && !numberCurveFor(spec)) {
      this.logger.debug(`Number question "${spec.id}" has no scoring curve and scores 0`);
    }
    return KIND_NORMALIZERS[spec.kind](spec, raw);
  }

  /**
   * Weighted mean over the configured questions that were answered.
   * Unanswered questions are skipped, not defaulted.
   */
  scoreCategory(category: AssessmentCategory, answers: Answers): CategoryResult {
    const records: AnswerRecord[] = [];
    let weightedSum = 0;
    let totalWeight = 0;

    for (const spec of this.ruleConfig.questions(category)) {
      if (!Object.prototype.hasOwnProperty.call(answers, spec.id)) {
        continue;
      }

      const rawAnswer = answers[spec.id];
      const normalizedScore = this.normalize(spec, rawAnswer);
      records.push({
        questionId: spec.id,
        questionText: spec.text,
        rawAnswer,
        category,
        weight: spec.weight,
        normalizedScore,
      });

      weightedSum += normalizedScore * spec.weight;
      totalWeight += spec.weight;
    }

    const score = totalWeight > 0 ? weightedSum / totalWeight : 0;
    return { score, answers: records };
  }

  scoreFinal(answers: Answers): FinalScoreResult {
    const weights = this.ruleConfig.categoryWeights();
    const categoryScores: Partial<Record<AssessmentCategory, number>> = {};
    const allAnswers: AnswerRecord[] = [];
    let weightedSum = 0;
    let totalWeight = 0;

    for (const category of ASSESSMENT_CATEGORIES) {
      const result = this.scoreCategory(category, answers);
      categoryScores[category] = result.score;
      allAnswers.push(...result.answers);

      const weight = weights[category] ?? 0;
      weightedSum += result.score * weight;
      totalWeight += weight;
    }

    const finalScore = totalWeight > 0 ? weightedSum / totalWeight : 0;
    this.logger.debug(`Final score ${finalScore.toFixed(2)} from ${JSON.stringify(categoryScores)}`);

    return { finalScore, categoryScores, answers: allAnswers };
  }
}
