export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const DEFAULT_DAILY_MOTIVATIONS: readonly string[] = [
  'Consistency beats talent every single time.',
  'One day at a time. Every decision counts.',
  'You do not need to trade every day. You need to trade well.',
  'Your best trade is the one you skip when conditions are not there.',
  'Trading is a marathon, not a sprint.',
  'Every session is a chance to learn.',
  'Trust your process. Results follow.',
  'Patience is the most profitable skill in trading.',
];

export const PSYCHOLOGY_ANSWER_IDS = ['mental_state', 'emotional_control'];
