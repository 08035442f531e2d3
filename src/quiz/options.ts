import { Direction, hasDistinctQuestions, QAPair, uniqueAnswers } from './pair-deriver';
import { randomIndex, RandomSource } from './random';
import { TopicBehavior } from './topics';

export const MAX_OPTIONS = 8;
export const FREE_TEXT = 0;

export enum OptionMode {
  FREE_TEXT = 'free-text',
  EXACT = 'exact',
  VARIABLE = 'variable',
}

export interface FreeTextPolicy {
  mode: OptionMode.FREE_TEXT;
  /** Whether a delimiter-separated list of values is read as several answers. */
  multipleTokens: boolean;
}

export interface ExactPolicy {
  mode: OptionMode.EXACT;
  options: readonly string[];
}

export interface VariablePolicy {
  mode: OptionMode.VARIABLE;
  count: number;
  /** Same-question values drawn from the pool are accepted instead of skipped. */
  multipleAnswers: boolean;
}

export type OptionPolicy = FreeTextPolicy | ExactPolicy | VariablePolicy;

export interface OptionCountRange {
  lower: number;
  upper: number;
  extras: number[];
}

export interface OptionDraw {
  options: string[];
  accepted: Set<string>;
  /** Pool indices of the pairs whose answers are accepted, the drawn one first. */
  acceptedIds: number[];
}

/**
 * Option counts a session may ask for. Free text and the full answer list are
 * only offered when every question label is distinct, since otherwise a single
 * answer could not tell the repeated questions apart.
 */
export const optionCountRange = (pairs: readonly QAPair[]): OptionCountRange => {
  const answerCount = uniqueAnswers(pairs).length;
  const extras: number[] = [];
  if (hasDistinctQuestions(pairs)) {
    extras.push(FREE_TEXT);
    if (answerCount > MAX_OPTIONS) {
      extras.push(answerCount);
    }
  }
  return { lower: 2, upper: Math.min(MAX_OPTIONS, answerCount), extras };
};

export const isAllowedOptionCount = (range: OptionCountRange, count: number): boolean =>
  (range.lower <= count && count <= range.upper) || range.extras.includes(count);

export const generateOptions = (
  pairs: readonly QAPair[],
  requestedCount: number,
  { direction, behavior }: { direction: Direction; behavior: TopicBehavior },
): OptionPolicy => {
  const askTopic = direction === Direction.TOPIC_FROM_COUNTRY;
  if (requestedCount === FREE_TEXT) {
    return { mode: OptionMode.FREE_TEXT, multipleTokens: askTopic && behavior.multiValued };
  }

  const answers = uniqueAnswers(pairs);
  if (requestedCount === answers.length && hasDistinctQuestions(pairs)) {
    return { mode: OptionMode.EXACT, options: answers };
  }
  return { mode: OptionMode.VARIABLE, count: requestedCount, multipleAnswers: !askTopic };
};

/**
 * Draws the options for one question from the whole answer pool. The drawn
 * answer is always among them; sampling stops at the requested count or when
 * no further value can be added.
 */
export const drawOptions = (
  pool: readonly QAPair[],
  drawnId: number,
  policy: VariablePolicy,
  random: RandomSource,
): OptionDraw => {
  const drawn = pool[drawnId];
  const options = new Set([drawn.answer]);
  const accepted = new Set([drawn.answer]);
  const acceptedIds = [drawnId];

  const addable = new Set(
    pool
      .filter((pair) => policy.multipleAnswers || pair.question !== drawn.question)
      .map((pair) => pair.answer)
      .filter((answer) => !options.has(answer)),
  );
  const target = Math.min(policy.count, options.size + addable.size);

  while (options.size < target) {
    const candidateId = randomIndex(pool.length, random);
    const candidate = pool[candidateId];
    if (options.has(candidate.answer)) {
      continue;
    }
    if (candidate.question !== drawn.question) {
      options.add(candidate.answer);
    } else if (policy.multipleAnswers) {
      accepted.add(candidate.answer);
      acceptedIds.push(candidateId);
      options.add(candidate.answer);
    }
  }

  return { options: Array.from(options).sort(), accepted, acceptedIds };
};
