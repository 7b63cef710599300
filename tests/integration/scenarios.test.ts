/**
 * Pattern Scenario Tests
 * End-to-end parse and generate behaviour for representative patterns
 */

import { describe, it, expect } from 'vitest';
import { generateMany } from '../../src/lib/generator/engine.js';
import { parsePattern } from '../../src/lib/parser/parser.js';
import { PatternSyntaxError } from '../../src/utils/errors.js';
import { createRandomSource } from '../../src/utils/seed-manager.js';

const SAMPLES = 4000;

function countOf(values: string[], target: string): number {
  return values.filter((value) => value === target).length;
}

describe('Pattern scenarios', () => {
  it('should parse the same text to the same tree every time', () => {
    const source = '^(a|bc)*[[:digit:]~Cat(0=0.5)]{2~Bin(0.5)}.$';
    expect(parsePattern(source)).toEqual(parsePattern(source));
  });

  it('should always render a plain sequence verbatim', () => {
    expect(new Set(generateMany(parsePattern('ab'), 100, createRandomSource('s1')))).toEqual(
      new Set(['ab']),
    );
  });

  it('should split alternation roughly evenly', () => {
    const values = generateMany(parsePattern('a|b'), SAMPLES, createRandomSource('s2'));
    expect(countOf(values, 'a') + countOf(values, 'b')).toBe(SAMPLES);
    expect(countOf(values, 'a') / SAMPLES).toBeGreaterThan(0.45);
    expect(countOf(values, 'a') / SAMPLES).toBeLessThan(0.55);
  });

  it('should repeat a fixed count exactly', () => {
    expect(new Set(generateMany(parsePattern('a{3}'), 100, createRandomSource('s3')))).toEqual(
      new Set(['aaa']),
    );
  });

  it('should only draw class members', () => {
    for (const value of generateMany(parsePattern('[abc]'), 500, createRandomSource('s4'))) {
      expect(['a', 'b', 'c']).toContain(value);
    }
  });

  it('should locate an unmatched group at its opening parenthesis', () => {
    expect(() => parsePattern('a(b')).toThrow(PatternSyntaxError);
    expect(() => parsePattern('a(b')).toThrow("Syntax error at position 1: unmatched '('");
  });

  it('should let a Bernoulli count override the literal count', () => {
    const values = generateMany(parsePattern('a{2~Ber(0.5)}'), SAMPLES, createRandomSource('s6'));
    expect(countOf(values, '') + countOf(values, 'a')).toBe(SAMPLES);
    expect(countOf(values, 'a') / SAMPLES).toBeGreaterThan(0.45);
    expect(countOf(values, 'a') / SAMPLES).toBeLessThan(0.55);
  });

  it('should keep uniform repeat counts within bounds', () => {
    const values = generateMany(parsePattern('z{2,5}'), SAMPLES, createRandomSource('bounds'));
    const lengths = values.map((value) => value.length);
    for (const length of [2, 3, 4, 5]) {
      const share = lengths.filter((observed) => observed === length).length / SAMPLES;
      expect(share).toBeGreaterThan(0.21);
      expect(share).toBeLessThan(0.29);
    }
    expect(Math.min(...lengths)).toBe(2);
    expect(Math.max(...lengths)).toBe(5);
  });
});
