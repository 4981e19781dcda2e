/**
 * Source of uniformly distributed integers.
 */
export interface RandomSource {
  /**
   * Return an integer in `[0, bound)`. `bound` must be a positive integer.
   */
  nextInt(bound: number): number;
}

/** Seed used when none is configured. */
export const DEFAULT_SEED = 42;

/**
 * Deterministic generator (mulberry32). Two instances created with the same
 * seed produce the same stream.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number = DEFAULT_SEED) {
    this.state = seed >>> 0;
  }

  /**
   * Return a float in `[0, 1)`.
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.next() * bound);
  }
}
