/**
 * Distribution Statistics Tests
 * Verifies that seeded samples follow the declared distributions
 */

import { describe, it, expect } from 'vitest';
import { generateMany } from '../../src/lib/generator/engine.js';
import { parsePattern } from '../../src/lib/parser/parser.js';
import { createRandomSource } from '../../src/utils/seed-manager.js';

const SAMPLES = 6000;

function frequencies(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

function share(counts: Map<string, number>, key: string): number {
  return (counts.get(key) ?? 0) / SAMPLES;
}

describe('Distribution statistics', () => {
  it('should pick class members uniformly without an annotation', () => {
    const counts = frequencies(
      generateMany(parsePattern('[abc]'), SAMPLES, createRandomSource('uniform-class')),
    );
    for (const key of ['a', 'b', 'c']) {
      expect(share(counts, key)).toBeGreaterThan(0.3);
      expect(share(counts, key)).toBeLessThan(0.37);
    }
  });

  it('should converge on the Bernoulli probability', () => {
    const counts = frequencies(
      generateMany(parsePattern('a{1~Ber(0.3)}'), SAMPLES, createRandomSource('bernoulli')),
    );
    expect(share(counts, 'a')).toBeGreaterThan(0.27);
    expect(share(counts, 'a')).toBeLessThan(0.33);
    expect([...counts.keys()].sort()).toEqual(['', 'a']);
  });

  it('should follow categorical repeat weights', () => {
    const counts = frequencies(
      generateMany(parsePattern('x{2~Cat(0.2,0.3)}'), SAMPLES, createRandomSource('categorical')),
    );
    expect(share(counts, '')).toBeGreaterThan(0.17);
    expect(share(counts, '')).toBeLessThan(0.23);
    expect(share(counts, 'x')).toBeGreaterThan(0.27);
    expect(share(counts, 'x')).toBeLessThan(0.33);
    expect(share(counts, 'xx')).toBeGreaterThan(0.47);
    expect(share(counts, 'xx')).toBeLessThan(0.53);
  });

  it('should average (1 - p) / p extra repeats for a geometric count', () => {
    const values = generateMany(parsePattern('a{0~Geo(0.5)}'), SAMPLES, createRandomSource('geo'));
    const mean = values.reduce((total, value) => total + value.length, 0) / SAMPLES;
    expect(mean).toBeGreaterThan(0.9);
    expect(mean).toBeLessThan(1.1);
  });

  it('should favour low ranks under zipf', () => {
    const counts = frequencies(
      generateMany(parsePattern('[abcd~Zipf(1)]'), SAMPLES, createRandomSource('zipf')),
    );
    expect(share(counts, 'a')).toBeGreaterThan(share(counts, 'b'));
    expect(share(counts, 'b')).toBeGreaterThan(share(counts, 'd'));
  });

  it('should only draw negated classes from the complement', () => {
    const values = generateMany(
      parsePattern('[^abc]', { alphabet: 'abcdef' }),
      SAMPLES,
      createRandomSource('negated'),
    );
    expect(new Set(values)).toEqual(new Set(['d', 'e', 'f']));
  });

  it('should keep unbounded repeats within maxRepeat', () => {
    const values = generateMany(parsePattern('a+'), SAMPLES, createRandomSource('cap'), {
      maxRepeat: 4,
    });
    expect(new Set(values.map((value) => value.length))).toEqual(new Set([1, 2, 3, 4]));
  });
});
