import { QAPair } from './pair-deriver';
import { randomIndex, RandomSource } from './random';

/**
 * Progress through a fixed list of pairs. Pairs keep their index for the whole
 * session; answering one only records its index.
 */
export class QuizSession {
  private readonly answered = new Set<number>();
  private mistakeCount = 0;

  constructor(readonly pairs: readonly QAPair[]) {}

  get total(): number {
    return this.pairs.length;
  }

  get answeredCount(): number {
    return this.answered.size;
  }

  get mistakes(): number {
    return this.mistakeCount;
  }

  get isComplete(): boolean {
    return this.answered.size === this.pairs.length;
  }

  remainingIds(): number[] {
    return this.pairs.map((_, id) => id).filter((id) => !this.answered.has(id));
  }

  draw(random: RandomSource): number {
    const remaining = this.remainingIds();
    if (remaining.length === 0) {
      throw new Error('No questions left to draw');
    }
    return remaining[randomIndex(remaining.length, random)];
  }

  /** Retires the given pairs; ids that are already answered stay answered. */
  markAnswered(ids: Iterable<number>): void {
    for (const id of ids) {
      if (!Number.isInteger(id) || id < 0 || id >= this.pairs.length) {
        throw new RangeError(`No pair with id ${id}`);
      }
      this.answered.add(id);
    }
  }

  recordMistake(): void {
    this.mistakeCount++;
  }
}
