import { CountryRecord } from '../countries/country.schema';

export enum FilterKind {
  INDEPENDENCE = 'independence',
  LOCATION = 'location',
  SIZE = 'size',
  ISLAND = 'island or not',
}

export type LocationField = 'region' | 'subregion';

export enum SizeClass {
  BIG = 'big',
  LARGE = 'large',
  SMALL = 'small',
}

export interface IndependenceFilter {
  kind: FilterKind.INDEPENDENCE;
  independent: boolean;
}

export interface LocationFilter {
  kind: FilterKind.LOCATION;
  field: LocationField;
  values: readonly string[];
}

export interface SizeFilter {
  kind: FilterKind.SIZE;
  size: SizeClass;
}

export interface IslandFilter {
  kind: FilterKind.ISLAND;
  island: boolean;
}

export type CountryFilter = IndependenceFilter | LocationFilter | SizeFilter | IslandFilter;

export type Condition = (country: CountryRecord) => boolean;

// km²
export const BIG_AREA = 1e4;
export const LARGE_AREA = 1e6;

const matchesSize = (area: number, size: SizeClass): boolean => {
  switch (size) {
    case SizeClass.BIG:
      return area >= BIG_AREA;
    case SizeClass.LARGE:
      return area >= LARGE_AREA;
    case SizeClass.SMALL:
      return area < BIG_AREA;
  }
};

export const matchesFilter = (country: CountryRecord, filter: CountryFilter): boolean => {
  switch (filter.kind) {
    case FilterKind.INDEPENDENCE:
      return country.independent === filter.independent;
    case FilterKind.LOCATION:
      return filter.values.includes(country[filter.field]);
    case FilterKind.SIZE:
      return matchesSize(country.area, filter.size);
    case FilterKind.ISLAND:
      return (country.borders.length === 0) === filter.island;
  }
};

export const buildCondition =
  (filters: readonly CountryFilter[]): Condition =>
  (country) =>
    filters.every((filter) => matchesFilter(country, filter));

/** Sorted distinct non-empty values of a location field, offered as filter choices. */
export const locationCandidates = (
  countries: readonly CountryRecord[],
  field: LocationField,
): string[] => {
  const values = new Set<string>();
  for (const country of countries) {
    if (country[field]) {
      values.add(country[field]);
    }
  }
  return Array.from(values).sort();
};
