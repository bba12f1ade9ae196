/**
 * Random sources for the keyword fallback scorer.
 *
 * The fallback jitters its confidence so unrelated text-only reports do not
 * all land on the same number. The source is passed in explicitly: seeded
 * from a request id it is reproducible, which is what tests rely on.
 */

import { createHash } from 'node:crypto';
import type { IntRange } from './types.js';

export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
}

export function nextInRange(random: RandomSource, range: IntRange): number {
  return random.nextInt(range[0], range[1]);
}

/** xorshift32 over a uint32 state, scaled to [0, 1). */
function xorshift32(seed: number): () => number {
  let state = seed >>> 0 || 0x12345678;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state / 0x1_0000_0000;
  };
}

function fromUniform(next: () => number): RandomSource {
  return {
    nextInt(min: number, max: number): number {
      if (max < min) {
        throw new RangeError(`Invalid range [${min}, ${max}]`);
      }
      return min + Math.floor(next() * (max - min + 1));
    },
  };
}

export function createSeededRandom(requestId: string): RandomSource {
  const seed = createHash('sha256').update(requestId).digest().readUInt32BE(0);
  return fromUniform(xorshift32(seed));
}

export function createUnseededRandom(): RandomSource {
  return fromUniform(Math.random);
}
