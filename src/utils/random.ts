/**
 * Seeded pseudo-random number generator for reproducible origin selection
 * Linear congruential generator with Numerical Recipes parameters
 */

export interface SeededRandom {
  readonly seed: number;
  next(): number;
  nextInt(min: number, max: number): number;
  nextChoice<T>(items: readonly T[]): T;
  fork(): SeededRandom;
  reset(): void;
}

const MULTIPLIER = 1664525;
const INCREMENT = 1013904223;
const MODULUS = 2 ** 32;

class LcgRandom implements SeededRandom {
  private state: number;

  constructor(readonly seed: number) {
    this.state = LcgRandom.normalize(seed);
  }

  // Keep the state an unsigned 32-bit integer so products stay exact
  private static normalize(seed: number): number {
    return ((Math.trunc(seed) % MODULUS) + MODULUS) % MODULUS;
  }

  /**
   * Next value in [0, 1)
   */
  next(): number {
    this.state = (MULTIPLIER * this.state + INCREMENT) % MODULUS;
    return this.state / MODULUS;
  }

  /**
   * Integer in [min, max], both inclusive
   */
  nextInt(min: number, max: number): number {
    if (min > max) {
      throw new Error('min must be <= max');
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  nextChoice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot choose from empty array');
    }
    const choice = items[this.nextInt(0, items.length - 1)];
    if (choice === undefined) {
      throw new Error('Chosen index fell outside the array');
    }
    return choice;
  }

  /**
   * Independent generator seeded from this one
   */
  fork(): SeededRandom {
    return new LcgRandom(this.nextInt(0, 2 ** 31 - 1));
  }

  reset(): void {
    this.state = LcgRandom.normalize(this.seed);
  }
}

export function createSeededRandom(seed: number): SeededRandom {
  return new LcgRandom(seed);
}
