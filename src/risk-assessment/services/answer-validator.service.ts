import { Injectable } from '@nestjs/common';
import { ValidationError } from '../../common/errors';
import { RuleConfigService } from './rule-config.service';
import { Answers, QuestionSpec, RawAnswer } from '../interfaces/risk-assessment.interface';

/**
 * Checks answers against their question definitions before they reach the
 * engine. The engine itself only clamps.
 */
@Injectable()
export class AnswerValidatorService {
  constructor(private ruleConfig: RuleConfigService) {}

  validate(answers: Answers): void {
    const issues: string[] = [];

    for (const [questionId, value] of Object.entries(answers)) {
      const spec = this.ruleConfig.question(questionId);
      if (!spec) {
        issues.push(`answers.${questionId}: unknown question`);
        continue;
      }
      const issue = checkAnswer(spec, value);
      if (issue) {
        issues.push(`answers.${questionId}: ${issue}`);
      }
    }

    if (issues.length > 0) {
      throw new ValidationError('Invalid answers', issues);
    }
  }
}

export function checkAnswer(spec: QuestionSpec, value: RawAnswer): string | null {
  if (spec.kind === 'boolean') {
    return typeof value === 'boolean' ? null : 'expected true or false';
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 'expected a number';
  }
  if (spec.min !== undefined && value < spec.min) {
    return `must be at least ${spec.min}`;
  }
  if (spec.max !== undefined && value > spec.max) {
    return `must be at most ${spec.max}`;
  }
  return null;
}
