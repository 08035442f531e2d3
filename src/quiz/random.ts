export const RANDOM_SOURCE = 'RANDOM_SOURCE';

/** Uniform numbers in [0, 1), injectable so tests can replay fixed draws. */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export const randomIndex = (length: number, random: RandomSource): number =>
  Math.min(Math.floor(random.next() * length), length - 1);
