// ============================================================================
// @fabricate/core — Seeded Random Source
// ============================================================================
//
// Mersenne Twister (random-js) behind a small API shaped for data generators.
//
// Seeding:
//   - MissingSeed  → no-op on reseed; at construction, use the global seed
//   - null         → reseed from entropy
//   - concrete     → SHA-256 of the type-tagged seed, as eight int32 words,
//                    so numbers, strings and bytes all seed deterministically
// ============================================================================

import { createHash } from 'node:crypto';
import { MersenneTwister19937, Random } from 'random-js';
import { InvalidArgumentError } from './errors.js';
import { getGlobalSeed } from './global_seed.js';
import { type ConcreteSeed, MissingSeed, type Seed, isConcreteSeed } from './types.js';

const ASCII_UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Expand a concrete seed into the int32 array fed to the twister.
 * `1` and `"1"` hash differently.
 */
export function seedToArray(seed: ConcreteSeed): number[] {
  const hash = createHash('sha256');
  if (typeof seed === 'number') {
    hash.update(`number:${seed}`);
  } else if (typeof seed === 'string') {
    hash.update(`string:${seed}`);
  } else {
    hash.update('bytes:');
    hash.update(seed);
  }
  const digest = hash.digest();
  const words: number[] = [];
  for (let i = 0; i < digest.length; i += 4) {
    words.push(digest.readInt32LE(i));
  }
  return words;
}

function createEngine(seed: Seed): MersenneTwister19937 {
  return isConcreteSeed(seed)
    ? MersenneTwister19937.seedWithArray(seedToArray(seed))
    : MersenneTwister19937.autoSeed();
}

/**
 * Per-instance pseudo-random generator.
 *
 * Two instances created with the same concrete seed produce the same
 * sequence for the same calls.
 *
 * @example
 * ```ts
 * const a = new SeededRandom(42);
 * const b = new SeededRandom(42);
 * a.randint(1, 6) === b.randint(1, 6); // true
 * ```
 */
export class SeededRandom {
  private rng: Random;

  constructor(seed: Seed = MissingSeed) {
    this.rng = new Random(createEngine(seed === MissingSeed ? getGlobalSeed() : seed));
  }

  /**
   * Reseed the generator. `MissingSeed` leaves the current state alone;
   * `null` reseeds from entropy.
   */
  seed(value: Seed): void {
    if (value === MissingSeed) return;
    this.rng = new Random(createEngine(value));
  }

  /** Float in [0, 1). */
  float(): number {
    return this.rng.real(0, 1, false);
  }

  /** Integer in [min, max], both inclusive. */
  randint(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max)) {
      throw new InvalidArgumentError('min', `randint bounds must be integers, got ${min}..${max}.`);
    }
    if (min > max) {
      throw new InvalidArgumentError('min', `randint min (${min}) is greater than max (${max}).`);
    }
    return this.rng.integer(min, max);
  }

  /** Float between a and b, rounded to `precision` decimals. */
  uniform(a: number, b: number, precision = 15): number {
    const value = a + (b - a) * this.float();
    return Number(value.toFixed(precision));
  }

  bool(): boolean {
    return this.rng.bool();
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new InvalidArgumentError('items', 'Cannot choose from an empty sequence.');
    }
    return this.rng.pick(items);
  }

  /** `k` picks with replacement. */
  choices<T>(items: readonly T[], k: number): T[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new InvalidArgumentError('k', `k must be a non-negative integer, got ${k}.`);
    }
    return Array.from({ length: k }, () => this.choice(items));
  }

  /** `k` distinct picks, without replacement. */
  sample<T>(items: readonly T[], k: number): T[] {
    if (!Number.isInteger(k) || k < 0 || k > items.length) {
      throw new InvalidArgumentError('k', `Sample size ${k} is out of range 0..${items.length}.`);
    }
    return this.rng.sample(items, k);
  }

  /** Shuffled copy; the input is left untouched. */
  shuffle<T>(items: readonly T[]): T[] {
    return this.rng.shuffle([...items]);
  }

  randints(amount = 3, a = 1, b = 100): number[] {
    if (amount <= 0) {
      throw new InvalidArgumentError('amount', `Amount must be greater than 0, got ${amount}.`);
    }
    return Array.from({ length: amount }, () => this.randint(a, b));
  }

  generateString(charset: string, length = 10): string {
    const chars = [...charset];
    return Array.from({ length }, () => this.choice(chars)).join('');
  }

  /**
   * Fill a mask: `char` becomes a random uppercase letter, `digit` a random
   * digit, every other character is kept.
   *
   * @example
   * ```ts
   * random.customCode('@###-##'); // 'K492-07'
   * ```
   */
  customCode(mask = '@###', char = '@', digit = '#'): string {
    if (char === digit) {
      throw new InvalidArgumentError(
        'char',
        'The same placeholder cannot be used for both letters and digits.',
      );
    }
    let code = '';
    for (const c of mask) {
      if (c === char) {
        code += ASCII_UPPERCASE[this.rng.integer(0, ASCII_UPPERCASE.length - 1)];
      } else if (c === digit) {
        code += String(this.rng.integer(0, 9));
      } else {
        code += c;
      }
    }
    return code;
  }
}
