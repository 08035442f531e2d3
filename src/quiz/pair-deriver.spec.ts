import { europeAndBeyond, makeCountry } from '../testing/countries.fixture';
import { buildCondition, FilterKind } from './condition';
import { normalizeText } from './normalizer';
import { derivePairs, Direction, hasDistinctQuestions, PairRequest, uniqueAnswers } from './pair-deriver';
import { Topic } from './topics';

const request = (overrides: Partial<PairRequest> = {}): PairRequest => ({
  topic: Topic.CAPITAL,
  direction: Direction.TOPIC_FROM_COUNTRY,
  nameVariant: 'common',
  condition: buildCondition([]),
  ...overrides,
});

describe('derivePairs', () => {
  const threeCountries = [
    makeCountry('A', { capital: ['X'] }),
    makeCountry('B', { capital: ['Y'] }),
    makeCountry('C', { capital: ['Y'] }),
  ];

  it('builds one pair per included country in dataset order', () => {
    const { pairs, behavior } = derivePairs(threeCountries, request());

    expect(pairs).toEqual([
      { question: 'A', answer: 'X' },
      { question: 'B', answer: 'Y' },
      { question: 'C', answer: 'Y' },
    ]);
    expect(uniqueAnswers(pairs)).toEqual(['X', 'Y']);
    expect(behavior.adjust('x')).toBe(behavior.adjust(pairs[0].answer));
  });

  it('swaps question and answer when asking for the country', () => {
    const { pairs } = derivePairs(threeCountries, request({ direction: Direction.COUNTRY_FROM_TOPIC }));

    expect(pairs).toEqual([
      { question: 'X', answer: 'A' },
      { question: 'Y', answer: 'B' },
      { question: 'Y', answer: 'C' },
    ]);
    expect(hasDistinctQuestions(pairs)).toBe(false);
  });

  it('joins multi-valued capitals and languages in sorted order', () => {
    const southAfrica = europeAndBeyond.filter((country) => country.cca3 === 'ZAF');

    expect(derivePairs(southAfrica, request()).pairs).toEqual([
      { question: 'South Africa', answer: 'Bloemfontein, Cape Town, Pretoria' },
    ]);
    expect(derivePairs(southAfrica, request({ topic: Topic.LANGUAGES })).pairs).toEqual([
      { question: 'South Africa', answer: 'Afrikaans, English, Zulu' },
    ]);
  });

  it('skips countries whose value fails the topic check', () => {
    const { pairs } = derivePairs(europeAndBeyond, request({ topic: Topic.SUBREGION }));

    expect(pairs.map((pair) => pair.question)).not.toContain('Antarctica');
    expect(pairs).toHaveLength(europeAndBeyond.length - 1);
  });

  it('spells out known neighbours and leaves out codes missing from the dataset', () => {
    const { pairs } = derivePairs(europeAndBeyond, request({ topic: Topic.BORDERS }));

    expect(pairs).toHaveLength(europeAndBeyond.length);
    expect(pairs[0]).toEqual({ question: 'France', answer: 'Germany' });
    expect(pairs[1]).toEqual({ question: 'Germany', answer: 'France' });
    expect(pairs[2]).toEqual({ question: 'Malta', answer: '-' });
    expect(pairs[5]).toEqual({ question: 'South Africa', answer: '-' });
  });

  it('renders areas with two significant digits and skips unknown areas', () => {
    const countries = [
      makeCountry('Germany', { area: 357022 }),
      makeCountry('Nowhere', { area: -1 }),
      makeCountry('Malta', { area: 316 }),
    ];

    const { pairs, behavior } = derivePairs(countries, request({ topic: Topic.AREA }));

    expect(pairs).toEqual([
      { question: 'Germany', answer: '360k' },
      { question: 'Malta', answer: '320' },
    ]);
    expect(behavior.label).toBe('area (in km²)');
    expect(behavior.adjust('357k')).toBe(behavior.adjust('360k'));
  });

  it('uses the requested name variant and condition', () => {
    const { pairs } = derivePairs(
      europeAndBeyond,
      request({
        topic: Topic.REGION,
        direction: Direction.COUNTRY_FROM_TOPIC,
        nameVariant: 'official',
        condition: buildCondition([{ kind: FilterKind.INDEPENDENCE, independent: false }]),
      }),
    );

    expect(pairs).toEqual([
      { question: 'Europe', answer: 'Åland Islands' },
      { question: 'Americas', answer: 'Greenland' },
      { question: 'Antarctic', answer: 'Antarctica' },
    ]);
  });

  it('compares free-text capitals regardless of case and accents', () => {
    const { pairs, behavior } = derivePairs(
      [makeCountry('Colombia', { capital: ['Bogotá'] })],
      request(),
    );

    expect(behavior.adjust('BOGOTA')).toBe(behavior.adjust(pairs[0].answer));
    expect(behavior.adjust).toBe(normalizeText);
  });
});
