/**
 * Sampling for the distribution kinds
 */

import type {
  Distribution,
  RandomSource,
  ZipfDistribution,
} from "../../types/distribution.js";

/**
 * Inclusive integer range a distribution can produce
 */
export interface Support {
  min: number;
  max: number;
}

export function supportOf(dist: Distribution): Support {
  switch (dist.kind) {
    case "constant":
      return { min: dist.value, max: dist.value };
    case "bernoulli":
      return { min: 0, max: 1 };
    case "binomial":
      return { min: 0, max: dist.n };
    case "categorical":
      return { min: 0, max: dist.weights.length - 1 };
    case "geometric":
      return { min: dist.start, max: Number.POSITIVE_INFINITY };
    case "zipf":
      return { min: 1, max: dist.k };
  }
}

/**
 * Pick an index with probability proportional to its weight
 *
 * @param randomValue - uniform draw in [0, 1)
 */
export function sampleIndex(weights: readonly number[], randomValue: number): number {
  let total = 0;
  for (const weight of weights) {
    total += weight;
  }

  const target = randomValue * total;
  let cumulative = 0;
  let lastPositive = 0;
  for (let i = 0; i < weights.length; i++) {
    const weight = weights[i] ?? 0;
    if (weight <= 0) continue;
    cumulative += weight;
    lastPositive = i;
    if (target < cumulative) {
      return i;
    }
  }

  // Floating point rounding can leave target just past the final bucket
  return lastPositive;
}

// Zipf weights depend only on (s, k); distributions are frozen, so cache per instance
const zipfWeights = new WeakMap<ZipfDistribution, number[]>();

function weightsFor(dist: ZipfDistribution): number[] {
  let weights = zipfWeights.get(dist);
  if (!weights) {
    weights = [];
    for (let rank = 1; rank <= dist.k; rank++) {
      weights.push(Math.pow(rank, -dist.s));
    }
    zipfWeights.set(dist, weights);
  }
  return weights;
}

/**
 * Draw a 0-based member index for a class annotated with `dist`.
 * Zipf ranks start at 1, so rank r selects index r - 1.
 */
export function sampleClassIndex(dist: Distribution, random: RandomSource): number {
  const value = sample(dist, random);
  return dist.kind === "zipf" ? value - 1 : value;
}

/**
 * Draw one value from `dist`. Pure given the state of `random`.
 */
export function sample(dist: Distribution, random: RandomSource): number {
  switch (dist.kind) {
    case "constant":
      return dist.value;

    case "bernoulli":
      return random.next() < dist.p ? 1 : 0;

    case "binomial": {
      let successes = 0;
      for (let trial = 0; trial < dist.n; trial++) {
        if (random.next() < dist.p) {
          successes++;
        }
      }
      return successes;
    }

    case "categorical":
      return sampleIndex(dist.weights, random.next());

    case "geometric": {
      // Inverse CDF; log1p keeps the divisor non-zero for p near 0
      const u = random.next();
      const failures = Math.floor(Math.log1p(-u) / Math.log1p(-dist.p));
      if (Number.isNaN(failures)) {
        return dist.start;
      }
      // A vanishing p can overflow to Infinity, which callers clamp
      return dist.start + failures;
    }

    case "zipf":
      return sampleIndex(weightsFor(dist), random.next()) + 1;
  }
}
