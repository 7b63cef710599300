import { describe, it, expect } from 'vitest';
import {
  createRandomSource,
  generateRandomSeed,
  hashStringToSeed,
  toNumericSeed,
} from '../../../src/utils/seed-manager.js';

function draws(seed: string | number, count: number): number[] {
  const random = createRandomSource(seed);
  return Array.from({ length: count }, () => random.next());
}

describe('Seed Manager', () => {
  it('should hash the same string to the same seed', () => {
    expect(hashStringToSeed('test-seed')).toBe(hashStringToSeed('test-seed'));
    expect(hashStringToSeed('test-seed')).not.toBe(hashStringToSeed('test-seed-2'));
  });

  it('should pass integer seeds through', () => {
    expect(toNumericSeed(42)).toBe(42);
    expect(toNumericSeed('42')).toBe(hashStringToSeed('42'));
    expect(toNumericSeed(1.5)).toBe(hashStringToSeed('1.5'));
  });

  it('should generate 64-digit hex random seeds', () => {
    expect(generateRandomSeed()).toMatch(/^[0-9a-f]{64}$/);
    expect(generateRandomSeed()).not.toBe(generateRandomSeed());
  });

  it('should replay the same draws for the same seed', () => {
    expect(draws('fixture', 5)).toEqual(draws('fixture', 5));
    expect(draws(7, 5)).toEqual(draws(7, 5));
  });

  it('should diverge for different seeds', () => {
    expect(draws('fixture-a', 5)).not.toEqual(draws('fixture-b', 5));
  });

  it('should draw from [0, 1)', () => {
    for (const value of draws('range-check', 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
