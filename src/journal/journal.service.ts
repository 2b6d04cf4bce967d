import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import * as Papa from 'papaparse';
import { RiskDecision } from '../risk-assessment/dto/risk-decision.dto';
import { Answers, TradeDetails, TradingStats } from '../risk-assessment/interfaces/risk-assessment.interface';
import { JournalEntry, journalEntrySchema, JournalQuery, JournalStats } from './dto/journal-entry.dto';

export const DEFAULT_JOURNAL_PATH = path.join('data', 'journal.jsonl');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface NewJournalEntry {
  answers: Answers;
  stats: TradingStats;
  decision: RiskDecision;
  tradeDetails?: TradeDetails;
  notes?: string;
}

const round1 = (value: number): number => Math.round(value * 10) / 10;

/**
 * Append-only session journal, one JSON document per line.
 */
@Injectable()
export class JournalService {
  private readonly logger = new Logger(JournalService.name);
  private readonly filePath: string;

  constructor(private configService: ConfigService) {
    this.filePath = this.configService.get<string>('JOURNAL_PATH') || DEFAULT_JOURNAL_PATH;
  }

  addEntry(input: NewJournalEntry): JournalEntry {
    const { decision } = input;
    const categoryScores: Record<string, number> = {};
    for (const [category, score] of Object.entries(decision.categoryScores)) {
      if (score !== undefined) {
        categoryScores[category] = score;
      }
    }

    const entry: JournalEntry = {
      id: randomUUID(),
      timestamp: decision.timestamp,
      answers: { ...input.answers },
      stats: { ...input.stats },
      decision: {
        shouldTrade: decision.shouldTrade,
        riskPercent: decision.riskPercent,
        finalScore: decision.finalScore,
        categoryScores,
        hardStopsPassed: decision.hardStopOutcome.passed,
        failedChecks: [...decision.hardStopOutcome.failedChecks],
      },
      tradeDetails: input.tradeDetails ? { ...input.tradeDetails } : null,
      lotSize: decision.lotSize,
      notes: input.notes ?? '',
    };

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    this.logger.log(`Journal entry ${entry.id} saved (trade: ${entry.decision.shouldTrade})`);

    return entry;
  }

  /** Oldest first; `limit` keeps the most recent entries. */
  getEntries(query: JournalQuery = {}): JournalEntry[] {
    let entries = this.readAll();
    if (query.tradedOnly) {
      entries = entries.filter((entry) => entry.decision.shouldTrade);
    }
    if (query.limit !== undefined) {
      entries = query.limit > 0 ? entries.slice(-query.limit) : [];
    }
    return entries;
  }

  daysSinceLastTrade(now: Date = new Date()): number | null {
    const traded = this.getEntries({ tradedOnly: true });
    const last = traded[traded.length - 1];
    if (!last) {
      return null;
    }
    return Math.floor((now.getTime() - Date.parse(last.timestamp)) / DAY_MS);
  }

  getStats(days: number, now: Date = new Date()): JournalStats {
    const since = now.getTime() - days * DAY_MS;
    const entries = this.readAll().filter((entry) => Date.parse(entry.timestamp) >= since);
    const traded = entries.filter((entry) => entry.decision.shouldTrade);
    const scoreSum = entries.reduce((sum, entry) => sum + entry.decision.finalScore, 0);

    return {
      periodDays: days,
      totalSessions: entries.length,
      tradesTaken: traded.length,
      avgScore: entries.length > 0 ? round1(scoreSum / entries.length) : 0,
      tradeRate: entries.length > 0 ? round1((traded.length / entries.length) * 100) : 0,
      risk2PercentCount: traded.filter((entry) => entry.decision.riskPercent === 2).length,
      risk3PercentCount: traded.filter((entry) => entry.decision.riskPercent === 3).length,
    };
  }

  toCsv(): string {
    const rows = this.readAll().map((entry) => ({
      timestamp: entry.timestamp,
      should_trade: entry.decision.shouldTrade,
      risk_percent: entry.decision.riskPercent,
      final_score: round1(entry.decision.finalScore),
      psychology: entry.decision.categoryScores.psychology ?? '',
      market_conditions: entry.decision.categoryScores.market_conditions ?? '',
      technical_confluence: entry.decision.categoryScores.technical_confluence ?? '',
      hard_stops_passed: entry.decision.hardStopsPassed,
      failed_checks: entry.decision.failedChecks.join('; '),
      instrument: entry.tradeDetails?.instrument ?? '',
      lot_size: entry.lotSize ?? '',
      notes: entry.notes,
    }));
    return Papa.unparse(rows);
  }

  private readAll(): JournalEntry[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    const entries: JournalEntry[] = [];
    const lines = fs.readFileSync(this.filePath, 'utf-8').split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        this.logger.warn(`Skipping unreadable journal line ${index + 1}: ${error instanceof Error ? error.message : error}`);
        return;
      }
      const result = journalEntrySchema.safeParse(parsed);
      if (result.success) {
        entries.push(result.data);
      } else {
        this.logger.warn(`Skipping malformed journal line ${index + 1}`);
      }
    });
    return entries;
  }
}
