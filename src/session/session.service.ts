import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { randomUUID } from 'crypto';
import { ValidationError } from '../common/errors';
import { JournalService } from '../journal/journal.service';
import { JournalEntry } from '../journal/dto/journal-entry.dto';
import { RiskAssessmentService } from '../risk-assessment/risk-assessment.service';
import { RuleConfigService } from '../risk-assessment/services/rule-config.service';
import { RiskDecision } from '../risk-assessment/dto/risk-decision.dto';
import { TradeDetails, TradingStats } from '../risk-assessment/interfaces/risk-assessment.interface';
import { AssessmentSession } from './assessment-session';

export const SESSION_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly sessions = new Map<string, AssessmentSession>();

  constructor(
    private ruleConfig: RuleConfigService,
    private riskAssessmentService: RiskAssessmentService,
    private journalService: JournalService,
  ) {}

  start(stats: TradingStats): AssessmentSession {
    const session = new AssessmentSession(randomUUID(), { ...stats }, this.ruleConfig.allQuestions());
    this.sessions.set(session.id, session);
    this.logger.log(`Session ${session.id} started`);
    return session;
  }

  /** Looks a session up and marks it as active. */
  get(id: string): AssessmentSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new NotFoundException(`Session ${id} not found`);
    }
    session.touch();
    return session;
  }

  answer(id: string, reply: string): AssessmentSession {
    const session = this.get(id);
    session.submit(reply);
    return session;
  }

  /**
   * May be called again with trade details once the first decision allows
   * trading; the decision is recomputed from the same answers.
   */
  evaluate(id: string, tradeDetails?: TradeDetails): RiskDecision {
    const session = this.get(id);
    if (!session.isComplete()) {
      const { answered, total } = session.progress();
      throw new ValidationError('Questionnaire is not finished', [`${answered} of ${total} questions answered`]);
    }

    if (tradeDetails) {
      session.tradeDetails = tradeDetails;
    }
    const decision = this.riskAssessmentService.evaluate(session.answers, session.stats, session.tradeDetails);
    session.lastDecision = decision;
    return decision;
  }

  saveToJournal(id: string, notes: string): JournalEntry {
    const session = this.get(id);
    if (!session.lastDecision) {
      throw new ValidationError('Session has not been evaluated yet');
    }

    return this.journalService.addEntry({
      answers: session.answers,
      stats: session.stats,
      decision: session.lastDecision,
      tradeDetails: session.tradeDetails,
      notes,
    });
  }

  cancel(id: string): void {
    if (!this.sessions.delete(id)) {
      throw new NotFoundException(`Session ${id} not found`);
    }
    this.logger.log(`Session ${id} cancelled`);
  }

  @Cron(CronExpression.EVERY_5_MINUTES)
  evictIdleSessions(now: number = Date.now()): number {
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (session.idleFor(now) > SESSION_IDLE_TIMEOUT_MS) {
        this.sessions.delete(id);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      this.logger.log(`Evicted ${evicted} idle session(s)`);
    }
    return evicted;
  }
}
