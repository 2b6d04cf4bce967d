import { AnswerRecord, RiskDecision } from '../dto/risk-decision.dto';
import { ASSESSMENT_CATEGORIES, RawAnswer } from '../interfaces/risk-assessment.interface';

const RULE = '='.repeat(60);

export function titleCase(key: string): string {
  return key
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function formatDecision(decision: RiskDecision): string {
  const lines = [RULE, 'TRADING DECISION', RULE];

  if (!decision.hardStopOutcome.passed) {
    lines.push('', 'NO TRADING TODAY', `Reason: ${decision.hardStopOutcome.reason ?? 'hard stop triggered'}`);
    return lines.join('\n');
  }

  lines.push('', `Final score: ${decision.finalScore.toFixed(1)}/100`, '', 'Category scores:');
  for (const category of ASSESSMENT_CATEGORIES) {
    const score = decision.categoryScores[category];
    if (score !== undefined) {
      lines.push(`  - ${titleCase(category)}: ${score.toFixed(1)}/100`);
    }
  }

  lines.push('', RULE);
  if (decision.shouldTrade) {
    lines.push(`TRADE ALLOWED at ${decision.riskPercent}% risk`);
    if (decision.lotSize !== null) {
      lines.push(`Recommended lot size: ${decision.lotSize} lots`);
    }
  } else {
    lines.push('DO NOT TRADE TODAY', 'Score too low. Wait for better conditions.');
  }
  lines.push(RULE);

  return lines.join('\n');
}

export function statusMark(normalizedScore: number): string {
  if (normalizedScore >= 70) return '[OK]';
  if (normalizedScore >= 40) return '[!!]';
  return '[XX]';
}

const formatRaw = (raw: RawAnswer): string => (typeof raw === 'boolean' ? (raw ? 'yes' : 'no') : String(raw));

export function formatBreakdown(decision: RiskDecision): string {
  const lines = [RULE, 'DETAILED BREAKDOWN', RULE];

  for (const category of ASSESSMENT_CATEGORIES) {
    const records: AnswerRecord[] = decision.answers.filter((record) => record.category === category);
    if (records.length === 0) {
      continue;
    }
    lines.push('', titleCase(category), '-'.repeat(60));
    for (const record of records) {
      lines.push(`  ${statusMark(record.normalizedScore)} ${record.questionText}`);
      lines.push(`     Answer: ${formatRaw(record.rawAnswer)} | Score: ${record.normalizedScore.toFixed(1)}/100`);
    }
  }

  return lines.join('\n');
}
