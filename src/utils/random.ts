/**
 * Seeded pseudo-random number generator so generated topologies are reproducible
 * Uses a simple LCG (Linear Congruential Generator) implementation
 */

export interface SeededRandom {
  readonly seed: number;
  next(): number;
  nextInt(min: number, max: number): number;
  nextWeight(min: number, max: number, decimals?: number): number;
  nextChoice<T>(items: readonly T[]): T;
  shuffle<T>(items: readonly T[]): T[];
  reset(): void;
}

// LCG parameters (from Numerical Recipes)
const A = 1664525;
const C = 1013904223;
const M = 2 ** 32;

class SeededRandomImpl implements SeededRandom {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  /**
   * Next value in [0, 1)
   */
  next(): number {
    this.state = (A * this.state + C) % M;
    return this.state / M;
  }

  /**
   * Integer in [min, max], both inclusive
   */
  nextInt(min: number, max: number): number {
    if (min > max) {
      throw new RangeError(`min (${min}) must be <= max (${max})`);
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Link weight in [min, max) rounded to `decimals` places
   */
  nextWeight(min: number, max: number, decimals = 0): number {
    if (min < 0 || min >= max) {
      throw new RangeError(`invalid weight range [${min}, ${max})`);
    }
    const factor = 10 ** decimals;
    const raw = min + this.next() * (max - min);
    return Math.max(min, Math.floor(raw * factor) / factor);
  }

  nextChoice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    const item = items[this.nextInt(0, items.length - 1)];
    if (item === undefined) {
      throw new RangeError('Cannot choose an undefined item');
    }
    return item;
  }

  /**
   * Fisher-Yates shuffle into a new array
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      const a = result[i];
      const b = result[j];
      if (a === undefined || b === undefined) continue;
      result[i] = b;
      result[j] = a;
    }
    return result;
  }

  reset(): void {
    this.state = this.seed;
  }
}

export function createSeededRandom(seed: number): SeededRandom {
  return new SeededRandomImpl(seed);
}
