import { createSequenceRandom } from '@quarry/test-utils';
import { describe, it, expect } from 'vitest';

import { SeededRandom, createRandomSource, pickOne, shuffled } from '../random/seeded-random.js';

describe('SeededRandom', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = new SeededRandom(99);
    const b = new SeededRandom(99);
    const seqA = Array.from({ length: 10 }, () => a.next());
    const seqB = Array.from({ length: 10 }, () => b.next());

    expect(seqA).toEqual(seqB);
  });

  it('should produce different sequences for different seeds', () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    expect(a.next()).not.toBe(b.next());
  });

  it('should stay within [0, 1)', () => {
    const random = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should accept a zero seed', () => {
    const random = new SeededRandom(0);
    const values = new Set(Array.from({ length: 5 }, () => random.next()));
    expect(values.size).toBe(5);
  });

  it('should create seeded sources that replay', () => {
    expect(createRandomSource(5).next()).toBe(createRandomSource(5).next());
  });

  it('should seed from fractional and non-finite numbers', () => {
    expect(createRandomSource(1.5).next()).toBe(createRandomSource(1.5).next());
    expect(createRandomSource(1.5).next()).not.toBe(createRandomSource(2.5).next());

    const value = new SeededRandom(Number.NaN).next();
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });
});

describe('pickOne', () => {
  it('should pick by scaled draw', () => {
    expect(pickOne(createSequenceRandom([0]), ['a', 'b', 'c'])).toBe('a');
    expect(pickOne(createSequenceRandom([0.5]), ['a', 'b', 'c'])).toBe('b');
    expect(pickOne(createSequenceRandom([0.999]), ['a', 'b', 'c'])).toBe('c');
  });

  it('should consume one draw even for an empty list', () => {
    const random = createSequenceRandom([0.3]);
    expect(pickOne(random, [])).toBeUndefined();
    expect(random.draws).toBe(1);
  });
});

describe('shuffled', () => {
  it('should return a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5];
    const output = shuffled(new SeededRandom(3), input);

    expect(input).toEqual([1, 2, 3, 4, 5]);
    expect([...output].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('should draw once per position after the first', () => {
    const random = createSequenceRandom([0]);
    expect(shuffled(random, ['a', 'b', 'c'])).toEqual(['b', 'c', 'a']);
    expect(random.draws).toBe(2);
  });
});
