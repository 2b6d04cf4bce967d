import { ValidationError } from '../common/errors';
import { QuestionSpec } from '../risk-assessment/interfaces/risk-assessment.interface';
import { AssessmentSession, parseReply } from './assessment-session';

const bias: QuestionSpec = {
  id: 'clear_bias',
  text: 'Clear bias?',
  category: 'technical_confluence',
  kind: 'boolean',
  weight: 1,
  reverseScore: false,
};

const mood: QuestionSpec = {
  id: 'mental_state',
  text: 'Mental state?',
  category: 'psychology',
  kind: 'scale',
  min: 1,
  max: 5,
  weight: 1,
  reverseScore: false,
};

const sleep: QuestionSpec = {
  id: 'sleep_quality',
  text: 'Hours slept?',
  category: 'psychology',
  kind: 'number',
  min: 0,
  max: 24,
  weight: 1,
  reverseScore: false,
};

describe('parseReply', () => {
  it.each(['y', 'YES', ' s ', 'si', 'sí'])('reads %p as yes', (reply) => {
    expect(parseReply(bias, reply)).toBe(true);
  });

  it.each(['n', 'No'])('reads %p as no', (reply) => {
    expect(parseReply(bias, reply)).toBe(false);
  });

  it('rejects other replies to a yes/no question', () => {
    expect(() => parseReply(bias, 'maybe')).toThrow('Please answer yes or no');
  });

  it('truncates scale replies', () => {
    expect(parseReply(mood, '4.7')).toBe(4);
  });

  it('keeps fractional hours', () => {
    expect(parseReply(sleep, '6.5')).toBe(6.5);
  });

  it('rejects values outside the range', () => {
    expect(() => parseReply(mood, '6')).toThrow('The value must be between 1 and 5');
  });

  it.each(['', 'abc', '0x10', '1e1', '.5', '7.'])('rejects %p as a number', (reply) => {
    expect(() => parseReply(sleep, reply)).toThrow('Please enter a valid number');
  });
});

describe('AssessmentSession', () => {
  let session: AssessmentSession;

  beforeEach(() => {
    session = new AssessmentSession('session-1', { consecutiveLosses: 0, dailyLossPercent: 0 }, [mood, bias]);
  });

  it('walks the questions in order', () => {
    expect(session.currentQuestion()).toBe(mood);

    session.submit('3');

    expect(session.currentQuestion()).toBe(bias);
    expect(session.progress()).toEqual({ answered: 1, total: 2 });

    session.submit('y');

    expect(session.isComplete()).toBe(true);
    expect(session.currentQuestion()).toBeUndefined();
    expect(session.answers).toEqual({ mental_state: 3, clear_bias: true });
  });

  it('stays on the question after a bad reply', () => {
    expect(() => session.submit('nine')).toThrow(ValidationError);

    expect(session.currentQuestion()).toBe(mood);
    expect(session.answers).toEqual({});
  });

  it('refuses replies once complete', () => {
    session.submit('3');
    session.submit('n');

    expect(() => session.submit('y')).toThrow('All questions have already been answered');
  });

  it('keeps answers separate between sessions', () => {
    const other = new AssessmentSession('session-2', { consecutiveLosses: 0, dailyLossPercent: 0 }, [mood, bias]);

    session.submit('5');

    expect(other.answers).toEqual({});
    expect(other.currentQuestion()).toBe(mood);
  });
});

describe('AssessmentSession idle time', () => {
  it('measures idle time from the last touch', () => {
    const session = new AssessmentSession('session-3', { consecutiveLosses: 0, dailyLossPercent: 0 }, [mood], 1000);

    expect(session.idleFor(4000)).toBe(3000);

    session.touch(3500);

    expect(session.idleFor(4000)).toBe(500);
  });
});
