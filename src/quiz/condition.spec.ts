import { europeAndBeyond } from '../testing/countries.fixture';
import { buildCondition, CountryFilter, FilterKind, locationCandidates, SizeClass } from './condition';

const namesMatching = (filters: CountryFilter[]) =>
  europeAndBeyond.filter(buildCondition(filters)).map((country) => country.name.common);

describe('buildCondition', () => {
  it('accepts every country without filters', () => {
    expect(namesMatching([])).toHaveLength(europeAndBeyond.length);
  });

  it('partitions by independence', () => {
    const independent = namesMatching([{ kind: FilterKind.INDEPENDENCE, independent: true }]);
    const dependent = namesMatching([{ kind: FilterKind.INDEPENDENCE, independent: false }]);

    expect(independent).toEqual(['France', 'Germany', 'Malta', 'South Africa']);
    expect(dependent).toEqual(['Åland Islands', 'Greenland', 'Antarctica']);
  });

  it('keeps countries in the chosen locations', () => {
    expect(
      namesMatching([{ kind: FilterKind.LOCATION, field: 'region', values: ['Africa', 'Americas'] }]),
    ).toEqual(['Greenland', 'South Africa']);
    expect(
      namesMatching([{ kind: FilterKind.LOCATION, field: 'subregion', values: ['Western Europe'] }]),
    ).toEqual(['France', 'Germany']);
  });

  it('applies the fixed area thresholds', () => {
    expect(namesMatching([{ kind: FilterKind.SIZE, size: SizeClass.LARGE }])).toEqual([
      'Greenland',
      'South Africa',
      'Antarctica',
    ]);
    expect(namesMatching([{ kind: FilterKind.SIZE, size: SizeClass.SMALL }])).toEqual([
      'Malta',
      'Åland Islands',
    ]);
    expect(namesMatching([{ kind: FilterKind.SIZE, size: SizeClass.BIG }])).toEqual([
      'France',
      'Germany',
      'Greenland',
      'South Africa',
      'Antarctica',
    ]);
  });

  it('treats countries without borders as islands', () => {
    expect(namesMatching([{ kind: FilterKind.ISLAND, island: false }])).toEqual([
      'France',
      'Germany',
      'South Africa',
    ]);
    expect(namesMatching([{ kind: FilterKind.ISLAND, island: true }])).toEqual([
      'Malta',
      'Åland Islands',
      'Greenland',
      'Antarctica',
    ]);
  });

  it('reads the island choice independently of the independence choice', () => {
    expect(
      namesMatching([
        { kind: FilterKind.INDEPENDENCE, independent: true },
        { kind: FilterKind.ISLAND, island: true },
      ]),
    ).toEqual(['Malta']);
  });

  it('combines filters by conjunction', () => {
    expect(
      namesMatching([
        { kind: FilterKind.LOCATION, field: 'region', values: ['Europe'] },
        { kind: FilterKind.SIZE, size: SizeClass.BIG },
        { kind: FilterKind.INDEPENDENCE, independent: true },
      ]),
    ).toEqual(['France', 'Germany']);
  });
});

describe('locationCandidates', () => {
  it('lists sorted distinct non-empty values', () => {
    expect(locationCandidates(europeAndBeyond, 'region')).toEqual([
      'Africa',
      'Americas',
      'Antarctic',
      'Europe',
    ]);
    expect(locationCandidates(europeAndBeyond, 'subregion')).toEqual([
      'North America',
      'Northern Europe',
      'Southern Africa',
      'Southern Europe',
      'Western Europe',
    ]);
  });
});
