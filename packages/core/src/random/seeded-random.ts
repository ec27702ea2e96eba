/**
 * Seedable random source
 *
 * Every random decision in the pipeline (corpus sampling, paragraph choice,
 * synonym substitution, sentence shuffling) draws from a RandomSource passed
 * in by the caller, so a fixed seed reproduces a run exactly.
 */

import type { RandomSource } from '@quarry/types';

const MASK_64 = 0xffffffffffffffffn;

/**
 * xorshift128+ generator producing uniform doubles in [0, 1)
 */
export class SeededRandom implements RandomSource {
  private state0: bigint;
  private state1: bigint;

  constructor(seed: number | bigint = Date.now()) {
    const base = BigInt.asUintN(64, seedBits(seed)) || 0x853c49e6748fea9bn;
    this.state0 = base;
    this.state1 = base ^ 0xda3e39cb94b95bdbn;
    // Discard the first outputs, which are poorly mixed for small seeds
    for (let i = 0; i < 16; i++) {
      this.nextBits();
    }
  }

  next(): number {
    // Top 53 bits give a uniformly distributed double
    return Number(this.nextBits() >> 11n) / 2 ** 53;
  }

  private nextBits(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    this.state0 = s0;
    s1 = (s1 ^ (s1 << 23n)) & MASK_64;
    s1 ^= s1 >> 17n;
    s1 ^= s0;
    s1 ^= s0 >> 26n;
    this.state1 = s1;
    return (this.state0 + this.state1) & MASK_64;
  }
}

/**
 * Integer seeds are used as is; any other number seeds from its Float64 bit pattern
 */
function seedBits(seed: number | bigint): bigint {
  if (typeof seed === 'bigint' || Number.isInteger(seed)) {
    return BigInt(seed);
  }
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, seed);
  return view.getBigUint64(0);
}

/**
 * Pick one element uniformly at random.
 * Always consumes exactly one draw; returns undefined for an empty list.
 */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T | undefined {
  const index = Math.floor(random.next() * items.length);
  return items[index];
}

/**
 * Fisher-Yates shuffle into a new array (full permutation draw)
 */
export function shuffled<T>(random: RandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random.next() * (i + 1));
    const current = result[i];
    const swap = result[j];
    if (current === undefined || swap === undefined) continue;
    result[i] = swap;
    result[j] = current;
  }
  return result;
}

/**
 * Create a random source, seeded when a seed is given
 */
export function createRandomSource(seed?: number): RandomSource {
  return seed === undefined ? new SeededRandom() : new SeededRandom(seed);
}
