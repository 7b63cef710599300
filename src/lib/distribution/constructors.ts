/**
 * Validating constructors for every distribution kind.
 * Each returns a frozen value or throws DistributionError.
 */

import type {
  BernoulliDistribution,
  BinomialDistribution,
  CategoricalDistribution,
  ConstantDistribution,
  GeometricDistribution,
  ZipfDistribution,
} from "../../types/distribution.js";
import { DistributionError } from "../../utils/errors.js";

function requireCount(kind: string, param: string, value: number, min = 0): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new DistributionError(
      `${kind} parameter ${param} must be an integer >= ${min}, got ${value}`,
      { kind, param, value },
    );
  }
}

function requireProbability(kind: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new DistributionError(
      `${kind} parameter p must be within [0, 1], got ${value}`,
      { kind, param: "p", value },
    );
  }
}

export function constant(value: number): ConstantDistribution {
  requireCount("constant", "v", value);
  const dist: ConstantDistribution = { kind: "constant", value };
  return Object.freeze(dist);
}

export function bernoulli(p: number): BernoulliDistribution {
  requireProbability("bernoulli", p);
  const dist: BernoulliDistribution = { kind: "bernoulli", p };
  return Object.freeze(dist);
}

export function binomial(n: number, p: number): BinomialDistribution {
  requireCount("binomial", "n", n);
  requireProbability("binomial", p);
  const dist: BinomialDistribution = { kind: "binomial", n, p };
  return Object.freeze(dist);
}

/**
 * @param weights - one non-negative weight per outcome; normalized when sampled
 */
export function categorical(weights: readonly number[]): CategoricalDistribution {
  if (weights.length === 0) {
    throw new DistributionError("categorical needs at least one weight", {
      kind: "categorical",
    });
  }

  let total = 0;
  weights.forEach((weight, index) => {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new DistributionError(
        `categorical weight ${index} must be a finite number >= 0, got ${weight}`,
        { kind: "categorical", index, value: weight },
      );
    }
    total += weight;
  });

  if (total <= 0) {
    throw new DistributionError("categorical weights must not all be zero", {
      kind: "categorical",
    });
  }

  const dist: CategoricalDistribution = {
    kind: "categorical",
    weights: Object.freeze([...weights]),
  };
  return Object.freeze(dist);
}

/**
 * Failures before the first success, counted from `start`
 */
export function geometric(p: number, start = 0): GeometricDistribution {
  if (!Number.isFinite(p) || p <= 0 || p >= 1) {
    throw new DistributionError(
      `geometric parameter p must be within (0, 1), got ${p}`,
      { kind: "geometric", param: "p", value: p },
    );
  }
  requireCount("geometric", "start", start);
  const dist: GeometricDistribution = { kind: "geometric", p, start };
  return Object.freeze(dist);
}

export function zipf(s: number, k: number): ZipfDistribution {
  if (!Number.isFinite(s) || s <= 0) {
    throw new DistributionError(`zipf parameter s must be > 0, got ${s}`, {
      kind: "zipf",
      param: "s",
      value: s,
    });
  }
  requireCount("zipf", "k", k, 1);
  const dist: ZipfDistribution = { kind: "zipf", s, k };
  return Object.freeze(dist);
}
