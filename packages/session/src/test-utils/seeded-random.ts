/**
 * Deterministic random source for challenge tokens and checksum feeds in
 * tests.
 *
 * @module test-utils/seeded-random
 */

/**
 * Linear congruential generator (glibc parameters).
 */
export class SeededRandom {
  private seed: number;
  private readonly initialSeed: number;

  constructor(seed: number = 12345) {
    this.seed = seed;
    this.initialSeed = seed;
  }

  /**
   * Next value in [0, 1).
   */
  next(): number {
    this.seed = (this.seed * 1103515245 + 12345) & 0x7fffffff;
    return this.seed / 0x80000000;
  }

  reset(seed?: number): void {
    this.seed = seed ?? this.initialSeed;
  }

  /**
   * Bound `next`, for passing as a `random` config option.
   */
  get source(): () => number {
    return () => this.next();
  }
}
