import { CountryRecord } from '../countries/country.schema';
import { expandScaledString, joinValues, normalizeText, scaledNumberToString } from './normalizer';

export enum Topic {
  CAPITAL = 'capital',
  FLAG = 'flag',
  LANGUAGES = 'languages',
  TWO_LETTER_CODE = 'two-letter code',
  THREE_LETTER_CODE = 'three-letter code',
  REGION = 'region',
  SUBREGION = 'subregion',
  BORDERS = 'borders',
  AREA = 'area',
}

export const TOPICS: readonly Topic[] = Object.values(Topic);

export interface TopicContext {
  commonNamesByCode: ReadonlyMap<string, string>;
}

/**
 * How one topic reads its value off a record and how answers to it compare.
 * `check` decides whether a record takes part at all, `transform` renders the
 * value as the answer string and `adjust` canonicalizes free-text input and
 * answers alike before comparison.
 */
export interface TopicDefinition<T> {
  topic: Topic;
  label: string;
  conjunction: string;
  multiValued: boolean;
  extract: (country: CountryRecord) => T;
  check: (value: T) => boolean;
  transform: (value: T, context: TopicContext) => string;
  adjust: (answer: string) => string;
}

export interface TopicBehavior {
  topic: Topic;
  label: string;
  conjunction: string;
  multiValued: boolean;
  adjust: (answer: string) => string;
  /** The transformed value, or undefined when the record fails the check. */
  answerFor: (country: CountryRecord, context: TopicContext) => string | undefined;
}

const defineTopic = <T>(definition: TopicDefinition<T>): TopicBehavior => ({
  topic: definition.topic,
  label: definition.label,
  conjunction: definition.conjunction,
  multiValued: definition.multiValued,
  adjust: definition.adjust,
  answerFor: (country, context) => {
    const value = definition.extract(country);
    return definition.check(value) ? definition.transform(value, context) : undefined;
  },
});

const isNonEmpty = (value: string): boolean => value.length > 0;
const identity = (value: string): string => value;

const scalarTopic = (
  topic: Topic,
  conjunction: string,
  extract: (country: CountryRecord) => string,
): TopicBehavior =>
  defineTopic<string>({
    topic,
    label: topic,
    conjunction,
    multiValued: false,
    extract,
    check: isNonEmpty,
    transform: identity,
    adjust: normalizeText,
  });

export const TOPIC_BEHAVIORS: Readonly<Record<Topic, TopicBehavior>> = {
  [Topic.CAPITAL]: defineTopic<readonly string[]>({
    topic: Topic.CAPITAL,
    label: Topic.CAPITAL,
    conjunction: 'with',
    multiValued: true,
    extract: (country) => country.capital,
    check: (capitals) => capitals.length > 0,
    transform: (capitals) => joinValues(capitals),
    adjust: normalizeText,
  }),
  [Topic.FLAG]: scalarTopic(Topic.FLAG, 'with', (country) => country.flag),
  [Topic.LANGUAGES]: defineTopic<Readonly<Record<string, string>>>({
    topic: Topic.LANGUAGES,
    label: Topic.LANGUAGES,
    conjunction: 'speaking',
    multiValued: true,
    extract: (country) => country.languages,
    check: (languages) => Object.keys(languages).length > 0,
    transform: (languages) => joinValues(Object.values(languages)),
    adjust: normalizeText,
  }),
  [Topic.TWO_LETTER_CODE]: scalarTopic(Topic.TWO_LETTER_CODE, 'abbreviated as', (country) => country.cca2),
  [Topic.THREE_LETTER_CODE]: scalarTopic(Topic.THREE_LETTER_CODE, 'abbreviated as', (country) => country.cca3),
  [Topic.REGION]: scalarTopic(Topic.REGION, 'in', (country) => country.region),
  [Topic.SUBREGION]: scalarTopic(Topic.SUBREGION, 'in', (country) => country.subregion),
  [Topic.BORDERS]: defineTopic<readonly string[]>({
    topic: Topic.BORDERS,
    label: Topic.BORDERS,
    conjunction: 'bordering',
    multiValued: true,
    extract: (country) => country.borders,
    check: () => true,
    // neighbours missing from the dataset cannot be named and are left out
    transform: (codes, { commonNamesByCode }) =>
      joinValues(codes.flatMap((code) => commonNamesByCode.get(code) ?? [])),
    adjust: normalizeText,
  }),
  [Topic.AREA]: defineTopic<number>({
    topic: Topic.AREA,
    label: 'area (in km²)',
    conjunction: 'with',
    multiValued: false,
    extract: (country) => country.area,
    check: (area) => area >= 0,
    transform: scaledNumberToString,
    adjust: expandScaledString,
  }),
};
