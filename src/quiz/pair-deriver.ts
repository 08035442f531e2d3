import { CountryRecord, NameVariant } from '../countries/country.schema';
import { Condition } from './condition';
import { NONE_PLACEHOLDER } from './normalizer';
import { Topic, TOPIC_BEHAVIORS, TopicBehavior } from './topics';

export enum Direction {
  /** The country is named and its topic value is asked for. */
  TOPIC_FROM_COUNTRY = 'topic-from-country',
  /** The topic value is named and the country is asked for. */
  COUNTRY_FROM_TOPIC = 'country-from-topic',
}

export interface QAPair {
  question: string;
  answer: string;
}

export interface PairRequest {
  topic: Topic;
  direction: Direction;
  nameVariant: NameVariant;
  condition: Condition;
}

export interface DerivedPairs {
  pairs: QAPair[];
  behavior: TopicBehavior;
}

export const derivePairs = (
  countries: readonly CountryRecord[],
  { topic, direction, nameVariant, condition }: PairRequest,
): DerivedPairs => {
  const behavior = TOPIC_BEHAVIORS[topic];
  const context = {
    commonNamesByCode: new Map(countries.map((country) => [country.cca3, country.name.common])),
  };

  const pairs: QAPair[] = [];
  for (const country of countries) {
    if (!condition(country)) {
      continue;
    }
    const value = behavior.answerFor(country, context);
    if (value === undefined) {
      continue;
    }
    const name = country.name[nameVariant];
    const topicValue = value || NONE_PLACEHOLDER;
    pairs.push(
      direction === Direction.TOPIC_FROM_COUNTRY
        ? { question: name, answer: topicValue }
        : { question: topicValue, answer: name },
    );
  }

  return { pairs, behavior };
};

export const uniqueAnswers = (pairs: readonly QAPair[]): string[] =>
  Array.from(new Set(pairs.map((pair) => pair.answer))).sort();

export const hasDistinctQuestions = (pairs: readonly QAPair[]): boolean =>
  new Set(pairs.map((pair) => pair.question)).size === pairs.length;
