import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { NotFoundException } from '@nestjs/common';
import { ValidationError } from '../common/errors';
import { RiskAssessmentService } from '../risk-assessment/risk-assessment.service';
import { RuleConfigService } from '../risk-assessment/services/rule-config.service';
import { HardStopGateService } from '../risk-assessment/services/hard-stop-gate.service';
import { ScoreEngineService } from '../risk-assessment/services/score-engine.service';
import { RiskDeciderService } from '../risk-assessment/services/risk-decider.service';
import { CALM_STATS, configServiceFor } from '../risk-assessment/testing/rules.fixture';
import { JournalService, NewJournalEntry } from '../journal/journal.service';
import { SESSION_IDLE_TIMEOUT_MS, SessionService } from './session.service';

const GOOD_REPLIES = ['4', '7', '4', 'n', '3', 'no', 'y', 'yes', 's', '4'];

describe('SessionService', () => {
  let service: SessionService;

  const mockJournalService = {
    addEntry: jest.fn((input: NewJournalEntry) => ({ id: 'entry-1', notes: input.notes })),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionService,
        RiskAssessmentService,
        RuleConfigService,
        HardStopGateService,
        ScoreEngineService,
        RiskDeciderService,
        { provide: ConfigService, useValue: configServiceFor() },
        { provide: JournalService, useValue: mockJournalService },
      ],
    }).compile();

    service = module.get<SessionService>(SessionService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const answerAll = (id: string) => {
    for (const reply of GOOD_REPLIES) {
      service.answer(id, reply);
    }
  };

  it('runs a questionnaire to a decision', () => {
    const session = service.start(CALM_STATS);
    answerAll(session.id);

    const decision = service.evaluate(session.id);

    expect(decision.shouldTrade).toBe(true);
    expect(decision.riskPercent).toBe(3);
    expect(decision.finalScore).toBeCloseTo(81.5, 10);
    expect(decision.lotSize).toBeNull();
    expect(service.get(session.id).lastDecision).toBe(decision);
  });

  it('sizes the trade when evaluated again with trade details', () => {
    const session = service.start(CALM_STATS);
    answerAll(session.id);
    const first = service.evaluate(session.id);

    const sized = service.evaluate(session.id, { balance: 10000, slPips: 20, instrument: 'EURUSD' });

    expect(sized.finalScore).toBe(first.finalScore);
    expect(sized.lotSize).toBe(1.5);
  });

  it('refuses to evaluate an unfinished questionnaire', () => {
    const session = service.start(CALM_STATS);
    service.answer(session.id, '4');

    expect(() => service.evaluate(session.id)).toThrow(ValidationError);
    try {
      service.evaluate(session.id);
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual(['1 of 10 questions answered']);
      }
    }
  });

  it('keeps concurrent sessions apart', () => {
    const first = service.start(CALM_STATS);
    const second = service.start({ consecutiveLosses: 5, dailyLossPercent: 0 });
    answerAll(first.id);
    answerAll(second.id);

    expect(service.evaluate(first.id).shouldTrade).toBe(true);
    expect(service.evaluate(second.id).hardStopOutcome.failedChecks).toEqual(['Consecutive losses (5) >= 3']);
  });

  it('throws for unknown sessions', () => {
    expect(() => service.get('missing')).toThrow(NotFoundException);
  });

  it('forgets a cancelled session', () => {
    const session = service.start(CALM_STATS);

    service.cancel(session.id);

    expect(() => service.get(session.id)).toThrow(NotFoundException);
    expect(() => service.cancel(session.id)).toThrow(NotFoundException);
  });

  it('journals the last decision of a session with notes', () => {
    const session = service.start(CALM_STATS);
    answerAll(session.id);
    const decision = service.evaluate(session.id, { balance: 10000, slPips: 20, instrument: 'EURUSD' });

    service.saveToJournal(session.id, 'followed the plan');

    expect(mockJournalService.addEntry).toHaveBeenCalledWith({
      answers: session.answers,
      stats: CALM_STATS,
      decision,
      tradeDetails: { balance: 10000, slPips: 20, instrument: 'EURUSD' },
      notes: 'followed the plan',
    });
  });

  it('refuses to journal a session that was never evaluated', () => {
    const session = service.start(CALM_STATS);

    expect(() => service.saveToJournal(session.id, '')).toThrow('Session has not been evaluated yet');
    expect(mockJournalService.addEntry).not.toHaveBeenCalled();
  });

  describe('evictIdleSessions', () => {
    const start = 1_000_000;

    it('evicts idle sessions and keeps recently used ones', () => {
      const now = jest.spyOn(Date, 'now').mockReturnValue(start);
      const idle = service.start(CALM_STATS);
      const active = service.start(CALM_STATS);

      now.mockReturnValue(start + 20 * 60 * 1000);
      service.answer(active.id, '4');

      const evicted = service.evictIdleSessions(start + SESSION_IDLE_TIMEOUT_MS + 1);

      expect(evicted).toBe(1);
      expect(() => service.get(idle.id)).toThrow(NotFoundException);
      expect(service.get(active.id).progress()).toEqual({ answered: 1, total: 10 });
    });

    it('evicts only once the idle timeout has passed', () => {
      jest.spyOn(Date, 'now').mockReturnValue(start);
      const ids = Array.from({ length: 50 }, () => service.start(CALM_STATS).id);

      expect(service.evictIdleSessions(start + SESSION_IDLE_TIMEOUT_MS)).toBe(0);
      expect(service.evictIdleSessions(start + SESSION_IDLE_TIMEOUT_MS + 1)).toBe(50);
      for (const id of ids) {
        expect(() => service.get(id)).toThrow(NotFoundException);
      }
    });
  });
});
