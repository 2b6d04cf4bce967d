import { ValidationError } from '../../common/errors';
import { AnswerValidatorService } from './answer-validator.service';
import { RuleConfigService } from './rule-config.service';
import { configServiceFor, GOOD_ANSWERS } from '../testing/rules.fixture';

describe('AnswerValidatorService', () => {
  let validator: AnswerValidatorService;

  const issuesFor = (answers: Record<string, boolean | number>): string[] => {
    try {
      validator.validate(answers);
    } catch (error) {
      if (error instanceof ValidationError) {
        return error.issues;
      }
      throw error;
    }
    return [];
  };

  beforeEach(() => {
    validator = new AnswerValidatorService(new RuleConfigService(configServiceFor()));
  });

  it('accepts well-formed answers', () => {
    expect(() => validator.validate(GOOD_ANSWERS)).not.toThrow();
  });

  it('rejects unknown question ids', () => {
    expect(issuesFor({ coffee_count: 2 })).toEqual(['answers.coffee_count: unknown question']);
  });

  it('rejects answers of the wrong type', () => {
    expect(issuesFor({ clear_bias: 1, mental_state: true })).toEqual([
      'answers.clear_bias: expected true or false',
      'answers.mental_state: expected a number',
    ]);
  });

  it('rejects scale and number answers outside their range', () => {
    expect(issuesFor({ mental_state: 6, sleep_quality: -1 })).toEqual([
      'answers.mental_state: must be at most 5',
      'answers.sleep_quality: must be at least 0',
    ]);
  });

  it('throws a ValidationError', () => {
    expect(() => validator.validate({ poi_quality: 0 })).toThrow(ValidationError);
  });
});
