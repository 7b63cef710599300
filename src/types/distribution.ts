/**
 * Distribution types shared by the parser, the resolver and the generation engine
 */

/**
 * Source of uniform random numbers in [0, 1).
 *
 * Samplers never reach for global randomness, so the same source state always
 * yields the same draws.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Distribution kinds, in the short form used by pattern annotations
 */
export type DistributionName = "const" | "ber" | "bin" | "cat" | "geo" | "zipf";

export const DISTRIBUTION_NAMES: readonly DistributionName[] = [
  "const",
  "ber",
  "bin",
  "cat",
  "geo",
  "zipf",
];

export interface ConstantDistribution {
  readonly kind: "constant";
  readonly value: number;
}

export interface BernoulliDistribution {
  readonly kind: "bernoulli";
  readonly p: number;
}

export interface BinomialDistribution {
  readonly kind: "binomial";
  readonly n: number;
  readonly p: number;
}

export interface CategoricalDistribution {
  readonly kind: "categorical";
  /** Unnormalized, non-negative outcome weights */
  readonly weights: readonly number[];
}

/**
 * Number of failures before the first success, shifted up by `start`
 */
export interface GeometricDistribution {
  readonly kind: "geometric";
  readonly p: number;
  readonly start: number;
}

/**
 * Rank in 1..k with weight proportional to rank^-s
 */
export interface ZipfDistribution {
  readonly kind: "zipf";
  readonly s: number;
  readonly k: number;
}

/**
 * Closed set of distributions a pattern can declare.
 * Adding a kind is a grammar change, not an extension point.
 */
export type Distribution =
  | ConstantDistribution
  | BernoulliDistribution
  | BinomialDistribution
  | CategoricalDistribution
  | GeometricDistribution
  | ZipfDistribution;

export type DistributionKind = Distribution["kind"];

/**
 * A distribution parameter as written in the pattern, before resolution
 */
export type RawParam =
  | { readonly type: "positional"; readonly value: number; readonly position: number }
  | {
      readonly type: "named";
      readonly key: string;
      readonly value: number;
      readonly position: number;
    };

/**
 * A `~Name(params)` annotation as written in the pattern
 */
export interface RawAnnotation {
  /** Name as written, case preserved */
  readonly name: string;
  readonly params: readonly RawParam[];
  /** Offset of the `~` in the pattern source */
  readonly position: number;
}
