/**
 * Scripted random sources
 */

import type { RandomSource } from '@quarry/types';

/**
 * Random source replaying fixed values in order, then cycling.
 * `draws` counts calls to next().
 */
export class SequenceRandom implements RandomSource {
  draws = 0;

  constructor(private readonly values: readonly number[]) {
    if (values.length === 0) {
      throw new Error('SequenceRandom needs at least one value');
    }
  }

  next(): number {
    const value = this.values[this.draws % this.values.length] ?? 0;
    this.draws++;
    return value;
  }
}

export function createSequenceRandom(values: readonly number[]): SequenceRandom {
  return new SequenceRandom(values);
}

/**
 * Random source that always returns the same value
 */
export function createConstantRandom(value: number): SequenceRandom {
  return new SequenceRandom([value]);
}
