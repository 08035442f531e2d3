export const DELIMITER = ',';
export const NONE_PLACEHOLDER = '-';

/** SI prefixes for exponent buckets -1..-10 and +1..+10 (powers of 1000). */
export const NEGATIVE_PREFIXES = 'mμnpfazyrq';
export const POSITIVE_PREFIXES = 'kMGTPEZYRQ';

const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Folds case and accents and collapses repeated spaces so that "ÀLAND  islands"
 * and "aland islands" compare equal.
 */
export const normalizeText = (text: string): string =>
  text
    .toLowerCase()
    .normalize('NFD')
    .replace(/\p{Mn}/gu, '')
    .replace(/ {2,}/g, ' ');

export const capitalize = (text: string): string => text.slice(0, 1).toUpperCase() + text.slice(1);

export const joinValues = (values: Iterable<string>): string =>
  [...values].sort().join(`${DELIMITER} `);

/** Parsed rather than computed with `**`, which is not correctly rounded for large exponents. */
const powerOfTen = (exponent: number): number => Number(`1e${exponent}`);

export const magnitudeExponent = (value: number): number => {
  const magnitude = Math.abs(value);
  if (magnitude === Infinity) {
    return Infinity;
  }
  if (magnitude === 0) {
    return -Infinity;
  }
  let exponent = 0;
  while (magnitude < powerOfTen(exponent)) {
    exponent--;
  }
  while (magnitude >= powerOfTen(exponent + 1)) {
    exponent++;
  }
  return exponent;
};

const roundTo = (value: number, digits: number): number =>
  digits >= 0
    ? Math.round(value * 10 ** digits) / 10 ** digits
    : Math.round(value / 10 ** -digits) * 10 ** -digits;

/**
 * Rounds to two significant digits and scales by the nearest lower power of
 * 1000, e.g. 357022 -> "360k" and 0.0042 -> "4.2m".
 */
export const scaledNumberToString = (value: number): string => {
  const literal = String(value);
  const exponent = magnitudeExponent(value);
  if (Math.abs(exponent) === Infinity) {
    return literal;
  }

  const bucket = Math.floor(exponent / 3);
  const remainder = exponent - 3 * bucket;
  const mantissa = roundTo(value / powerOfTen(3 * bucket), 1 - remainder);
  const digits = remainder > 0 ? String(Math.trunc(mantissa)) : mantissa.toFixed(1);
  if (bucket === 0) {
    return digits;
  }

  const prefixes = bucket > 0 ? POSITIVE_PREFIXES : NEGATIVE_PREFIXES;
  const index = Math.abs(bucket) - 1;
  return index < prefixes.length ? digits + prefixes[index] : literal;
};

/**
 * Reads "357k" as 357e+3 and canonicalizes it through scaledNumberToString.
 * Anything that is not a decimal number comes back unchanged.
 */
export const expandScaledString = (text: string): string => {
  if (!text) {
    return text;
  }

  const suffix = text[text.length - 1];
  let expanded = text;
  if (NEGATIVE_PREFIXES.includes(suffix)) {
    expanded = `${text.slice(0, -1)}e-${3 * (NEGATIVE_PREFIXES.indexOf(suffix) + 1)}`;
  } else if (POSITIVE_PREFIXES.includes(suffix)) {
    expanded = `${text.slice(0, -1)}e+${3 * (POSITIVE_PREFIXES.indexOf(suffix) + 1)}`;
  }

  expanded = expanded.trim();
  if (!DECIMAL_NUMBER.test(expanded)) {
    return text;
  }
  return scaledNumberToString(Number(expanded));
};
