/**
 * Generation engine - renders a Pattern into one string per call
 */

import type { RandomSource } from "../../types/distribution.js";
import type { Pattern, PatternNode, QuantifiedNode } from "../../types/pattern.js";
import { GenerationFault } from "../../utils/errors.js";
import { sample, sampleClassIndex } from "../distribution/sampler.js";
import type { GenerateOptions } from "./types.js";

/**
 * Default upper repeat bound for `*`, `+` and `{n,}`
 */
export const DEFAULT_MAX_REPEAT = 16;

interface RenderContext {
  random: RandomSource;
  alphabet: readonly string[];
  maxRepeat: number;
  out: string[];
}

export function resolveMaxRepeat(maxRepeat: number | undefined): number {
  const value = maxRepeat ?? DEFAULT_MAX_REPEAT;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`maxRepeat must be a non-negative integer, got ${value}`);
  }
  return value;
}

function uniformInt(min: number, max: number, random: RandomSource): number {
  return Math.min(max, min + Math.floor(random.next() * (max - min + 1)));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function pick<T>(items: readonly T[], index: number, what: string): T {
  const item = items[index];
  if (item === undefined) {
    throw new GenerationFault(`${what} index ${index} out of range`, {
      index,
      size: items.length,
    });
  }
  return item;
}

function repeatCount(node: QuantifiedNode, ctx: RenderContext): number {
  const { min, max } = node;
  if (!Number.isSafeInteger(min) || min < 0 || !(min <= max)) {
    throw new GenerationFault(`invalid repeat bounds [${min}, ${max}]`, { min, max });
  }

  const upper = Number.isFinite(max) ? max : Math.max(min, ctx.maxRepeat);
  if (node.distribution) {
    return clamp(sample(node.distribution, ctx.random), min, upper);
  }
  return uniformInt(min, upper, ctx.random);
}

function render(node: PatternNode, ctx: RenderContext): void {
  switch (node.type) {
    case "literal":
      ctx.out.push(node.char);
      return;

    case "wildcard":
      ctx.out.push(
        pick(ctx.alphabet, uniformInt(0, ctx.alphabet.length - 1, ctx.random), "wildcard"),
      );
      return;

    case "charclass": {
      const last = node.alphabet.length - 1;
      const index = node.distribution
        ? clamp(sampleClassIndex(node.distribution, ctx.random), 0, last)
        : uniformInt(0, last, ctx.random);
      ctx.out.push(pick(node.alphabet, index, "class member"));
      return;
    }

    case "concat":
      for (const child of node.children) {
        render(child, ctx);
      }
      return;

    case "alternation": {
      const index = uniformInt(0, node.branches.length - 1, ctx.random);
      render(pick(node.branches, index, "alternation branch"), ctx);
      return;
    }

    case "quantified": {
      const count = repeatCount(node, ctx);
      for (let i = 0; i < count; i++) {
        render(node.child, ctx);
      }
      return;
    }
  }
}

/**
 * Render one string from `pattern`.
 * Same pattern and same random source state always give the same string.
 *
 * @example
 * generate(parsePattern("a{2~Ber(0.5)}"), createRandomSource("seed")); // "" or "a"
 */
export function generate(
  pattern: Pattern,
  random: RandomSource,
  options: GenerateOptions = {},
): string {
  const ctx: RenderContext = {
    random,
    alphabet: pattern.alphabet,
    maxRepeat: resolveMaxRepeat(options.maxRepeat),
    out: [],
  };
  render(pattern.root, ctx);
  return ctx.out.join("");
}

/**
 * Render `count` strings, drawing from one random source in sequence
 */
export function generateMany(
  pattern: Pattern,
  count: number,
  random: RandomSource,
  options: GenerateOptions = {},
): string[] {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }

  const results: string[] = [];
  for (let i = 0; i < count; i++) {
    results.push(generate(pattern, random, options));
  }
  return results;
}
