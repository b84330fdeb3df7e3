/**
 * Seedable random source for randomized defaults.
 *
 * A pick is a pure function of (seed, key, items): the same seed draws the
 * same value for the same variable no matter what else was resolved first.
 */
import { createHash, randomBytes } from 'node:crypto';

export interface RandomSource {
  readonly seed: string;
  /** Pick one of `items`; `key` (the variable name) separates independent draws. */
  pick<T>(items: readonly T[], key: string): T;
}

/**
 * A fresh 16-hex-character seed.
 */
export function generateSeed(): string {
  return randomBytes(8).toString('hex');
}

export function createRandomSource(seed: string = generateSeed()): RandomSource {
  return {
    seed,
    pick<T>(items: readonly T[], key: string): T {
      if (items.length === 0) {
        throw new RangeError(`Cannot pick from an empty list (key: ${key})`);
      }
      return items[drawIndex(seed, key, items.length)];
    },
  };
}

/**
 * Index in [0, size): the first 32 bits of SHA-256("<seed>:<key>") modulo size.
 */
export function drawIndex(seed: string, key: string, size: number): number {
  const digest = createHash('sha256').update(`${seed}:${key}`).digest();
  return digest.readUInt32BE(0) % size;
}
