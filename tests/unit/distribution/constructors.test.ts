import { describe, it, expect } from 'vitest';
import {
  bernoulli,
  binomial,
  categorical,
  constant,
  geometric,
  zipf,
} from '../../../src/lib/distribution/constructors.js';
import { DistributionError } from '../../../src/utils/errors.js';

describe('Distribution constructors', () => {
  it('builds frozen values tagged with their kind', () => {
    const dist = binomial(4, 0.25);
    expect(dist).toEqual({ kind: 'binomial', n: 4, p: 0.25 });
    expect(Object.isFrozen(dist)).toBe(true);
  });

  it('accepts probability bounds for bernoulli', () => {
    expect(bernoulli(0).p).toBe(0);
    expect(bernoulli(1).p).toBe(1);
  });

  it.each([
    ['bernoulli above 1', () => bernoulli(1.5)],
    ['bernoulli below 0', () => bernoulli(-0.1)],
    ['bernoulli NaN', () => bernoulli(Number.NaN)],
    ['binomial fractional n', () => binomial(2.5, 0.5)],
    ['binomial negative n', () => binomial(-1, 0.5)],
    ['constant negative', () => constant(-1)],
    ['constant fractional', () => constant(1.5)],
    ['geometric p of 0', () => geometric(0)],
    ['geometric p of 1', () => geometric(1)],
    ['geometric negative start', () => geometric(0.5, -1)],
    ['zipf s of 0', () => zipf(0, 3)],
    ['zipf k of 0', () => zipf(1, 0)],
    ['categorical without weights', () => categorical([])],
    ['categorical negative weight', () => categorical([0.5, -0.5])],
    ['categorical all zero', () => categorical([0, 0])],
    ['categorical infinite weight', () => categorical([Infinity])],
  ])('rejects %s', (_label, build) => {
    expect(build).toThrow(DistributionError);
  });

  it('names the offending parameter', () => {
    try {
      binomial(3, 2);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DistributionError);
      if (!(error instanceof DistributionError)) return;
      expect(error.message).toBe('binomial parameter p must be within [0, 1], got 2');
      expect(error.details).toEqual({ kind: 'binomial', param: 'p', value: 2 });
    }
  });

  it('copies categorical weights', () => {
    const weights = [1, 2];
    const dist = categorical(weights);
    weights[0] = 5;
    expect(dist.weights).toEqual([1, 2]);
    expect(Object.isFrozen(dist.weights)).toBe(true);
  });

  it('defaults the geometric start to 0', () => {
    expect(geometric(0.25)).toEqual({ kind: 'geometric', p: 0.25, start: 0 });
  });
});
