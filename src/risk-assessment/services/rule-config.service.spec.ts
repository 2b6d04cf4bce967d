import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../../common/errors';
import { RuleConfigService } from './rule-config.service';
import { buildRules, configServiceFor } from '../testing/rules.fixture';

describe('RuleConfigService', () => {
  let ruleConfig: RuleConfigService;

  beforeEach(() => {
    ruleConfig = new RuleConfigService(configServiceFor());
  });

  it('fails when the rule document was never loaded', () => {
    expect(() => new RuleConfigService(new ConfigService({}))).toThrow(ConfigurationError);
  });

  it('exposes hard stop thresholds', () => {
    expect(ruleConfig.hardStopThresholds()).toEqual({
      maxConsecutiveLosses: 3,
      maxDailyLossPercent: 3,
      minSleepHours: 6,
      psychologyMinScore: 3,
      requireClearBias: true,
    });
  });

  it('keeps question order and fills question defaults', () => {
    const psychology = ruleConfig.questions('psychology');

    expect(psychology.map((q) => q.id)).toEqual([
      'mental_state',
      'sleep_quality',
      'emotional_control',
      'revenge_trading',
    ]);
    expect(psychology[3]).toEqual({
      id: 'revenge_trading',
      text: 'Urge to win back losses?',
      category: 'psychology',
      kind: 'boolean',
      weight: 1,
      reverseScore: true,
    });
  });

  it('defaults a scale question to the 1..5 range', () => {
    const rules = buildRules((raw) => {
      raw.questions.market_conditions = [{ id: 'liquidity', question: 'Liquidity?', type: 'scale' }];
    });
    const spec = new RuleConfigService(configServiceFor(rules)).question('liquidity');

    expect(spec?.min).toBe(1);
    expect(spec?.max).toBe(5);
  });

  it('looks questions up by id across categories', () => {
    expect(ruleConfig.question('poi_quality')?.category).toBe('technical_confluence');
    expect(ruleConfig.question('missing')).toBeUndefined();
    expect(ruleConfig.allQuestions()).toHaveLength(10);
  });

  it('reports a missing category weight as 0', () => {
    const rules = buildRules((raw) => {
      raw.scoring.weights = { psychology: 50, technical_confluence: 50 };
    });

    expect(new RuleConfigService(configServiceFor(rules)).categoryWeights()).toEqual({
      psychology: 50,
      market_conditions: 0,
      technical_confluence: 50,
    });
  });

  it('resolves pip values case-insensitively with a default of 10', () => {
    expect(ruleConfig.pipValue('eurusd')).toBe(10);
    expect(ruleConfig.pipValue('UsdJpy')).toBe(9.1);
    expect(ruleConfig.pipValue('BTCUSD')).toBe(10);
  });

  it('exposes thresholds and lot limits', () => {
    expect(ruleConfig.scoreThresholds()).toEqual({ noTrade: 50, risk2Percent: 70 });
    expect(ruleConfig.lotLimits()).toEqual({ minLotSize: 0.01, maxLotSize: 10 });
  });
});
