import { QuestionKind, QuestionSpec, RawAnswer, ScoreStep } from '../interfaces/risk-assessment.interface';

/** Maps a raw answer to a 0-100 sub-score. */
export type Normalizer = (spec: QuestionSpec, raw: RawAnswer) => number;

export const clampScore = (score: number): number => Math.max(0, Math.min(100, score));

/** First step whose `atLeast` the value reaches wins; steps are checked highest first. */
export function stepCurve(steps: readonly ScoreStep[]): (value: number) => number {
  const ordered = [...steps].sort((a, b) => b.atLeast - a.atLeast);
  return (value) => {
    const step = ordered.find((candidate) => value >= candidate.atLeast);
    return step ? clampScore(step.score) : 0;
  };
}

/** Built-in curves for `number` questions, keyed by question id. */
export const NUMBER_CURVES: Readonly<Record<string, (value: number) => number>> = {
  sleep_quality: stepCurve([
    { atLeast: 8, score: 100 },
    { atLeast: 6, score: 70 },
    { atLeast: 5, score: 50 },
  ]),
};

const toNumber = (raw: RawAnswer): number => (typeof raw === 'number' ? raw : raw ? 1 : 0);

export const normalizeBoolean: Normalizer = (spec, raw) => {
  const score = raw === true || (typeof raw === 'number' && raw !== 0) ? 100 : 0;
  return spec.reverseScore ? 100 - score : score;
};

export const normalizeScale: Normalizer = (spec, raw) => {
  const min = spec.min ?? 1;
  const max = spec.max ?? 5;
  return clampScore(((toNumber(raw) - min) / (max - min)) * 100);
};

/**
 * Returns the curve for a `number` question, or undefined when neither the
 * config nor the built-in table knows how to score it.
 */
export function numberCurveFor(spec: QuestionSpec): ((value: number) => number) | undefined {
  if (spec.steps && spec.steps.length > 0) {
    return stepCurve(spec.steps);
  }
  return NUMBER_CURVES[spec.id];
}

export const normalizeNumber: Normalizer = (spec, raw) => {
  const curve = numberCurveFor(spec);
  return curve ? curve(toNumber(raw)) : 0;
};

export const KIND_NORMALIZERS: Readonly<Record<QuestionKind, Normalizer>> = {
  boolean: normalizeBoolean,
  scale: normalizeScale,
  number: normalizeNumber,
};
