import { HardStopGateService } from './hard-stop-gate.service';
import { RuleConfigService } from './rule-config.service';
import { buildRules, CALM_STATS, configServiceFor, GOOD_ANSWERS } from '../testing/rules.fixture';

describe('HardStopGateService', () => {
  let gate: HardStopGateService;

  beforeEach(() => {
    gate = new HardStopGateService(new RuleConfigService(configServiceFor()));
  });

  it('passes when every check is satisfied', () => {
    const outcome = gate.evaluate(GOOD_ANSWERS, CALM_STATS);

    expect(outcome).toEqual({ passed: true, failedChecks: [] });
    expect(outcome.reason).toBeUndefined();
  });

  it('fails at exactly the consecutive loss limit', () => {
    const outcome = gate.evaluate(GOOD_ANSWERS, { consecutiveLosses: 3, dailyLossPercent: 0 });

    expect(outcome.passed).toBe(false);
    expect(outcome.failedChecks).toEqual(['Consecutive losses (3) >= 3']);
    expect(outcome.reason).toBe('Hard stops failed: Consecutive losses (3) >= 3');
  });

  it('fails at exactly the daily loss limit', () => {
    const outcome = gate.evaluate(GOOD_ANSWERS, { consecutiveLosses: 0, dailyLossPercent: 3 });

    expect(outcome.failedChecks).toEqual(['Daily loss (3%) >= 3%']);
  });

  it('reports every failed check, in table order', () => {
    const outcome = gate.evaluate(
      { sleep_quality: 4, mental_state: 2, clear_bias: false },
      { consecutiveLosses: 5, dailyLossPercent: 4.5 },
    );

    expect(outcome.failedChecks).toEqual([
      'Consecutive losses (5) >= 3',
      'Daily loss (4.5%) >= 3%',
      'Sleep hours (4) < 6',
      'Mental state (2) < 3',
      'No clear market bias',
    ]);
    expect(outcome.reason).toBe(
      'Hard stops failed: Consecutive losses (5) >= 3; Daily loss (4.5%) >= 3%; ' +
        'Sleep hours (4) < 6; Mental state (2) < 3; No clear market bias',
    );
  });

  it('treats missing answers and stats as the failing defaults', () => {
    const outcome = gate.evaluate({}, {});

    expect(outcome.failedChecks).toEqual(['Sleep hours (0) < 6', 'Mental state (0) < 3', 'No clear market bias']);
  });

  it('treats non-finite sleep and mental state answers as missing', () => {
    const outcome = gate.evaluate({ ...GOOD_ANSWERS, sleep_quality: Number.NaN, mental_state: Infinity }, CALM_STATS);

    expect(outcome.failedChecks).toEqual(['Sleep hours (0) < 6', 'Mental state (0) < 3']);
  });

  it('skips the bias check when it is not required', () => {
    const relaxed = new HardStopGateService(
      new RuleConfigService(
        configServiceFor(
          buildRules((raw) => {
            raw.hard_stops.require_clear_bias = false;
          }),
        ),
      ),
    );

    const outcome = relaxed.evaluate({ ...GOOD_ANSWERS, clear_bias: false }, CALM_STATS);

    expect(outcome.passed).toBe(true);
  });
});
