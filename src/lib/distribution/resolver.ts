/**
 * Annotation resolution
 *
 * Turns a raw `~Name(params)` annotation into a validated Distribution for
 * the position it is attached to: a long quantifier or a character class.
 * Positional parameters fill the kind's slots left to right, then named
 * parameters fill slots by key. Filling a slot twice is an error.
 */

import {
  DISTRIBUTION_NAMES,
  type Distribution,
  type DistributionName,
  type RawAnnotation,
  type RawParam,
} from "../../types/distribution.js";
import { UNBOUNDED } from "../../types/pattern.js";
import { DistributionError, PatternValidationError } from "../../utils/errors.js";
import {
  bernoulli,
  binomial,
  categorical,
  constant,
  geometric,
  zipf,
} from "./constructors.js";
import { supportOf } from "./sampler.js";

export const DISPLAY_NAMES: Readonly<Record<DistributionName, string>> = {
  const: "Const",
  ber: "Ber",
  bin: "Bin",
  cat: "Cat",
  geo: "Geo",
  zipf: "Zipf",
};

export const NAME_BY_KIND: Readonly<Record<Distribution["kind"], DistributionName>> = {
  constant: "const",
  bernoulli: "ber",
  binomial: "bin",
  categorical: "cat",
  geometric: "geo",
  zipf: "zipf",
};

/** Parameter slots in positional order */
export const PARAM_SLOTS: Readonly<Record<Exclude<DistributionName, "cat">, readonly string[]>> = {
  const: ["v"],
  ber: ["p"],
  bin: ["p", "n"],
  geo: ["p"],
  zipf: ["s", "k"],
};

const DEFAULT_P = 0.5;
const DEFAULT_CERTAIN_P = 1;
const DEFAULT_ZIPF_S = 1;

/**
 * Bounds written in a long quantifier, before any annotation applies
 */
export interface QuantifierBounds {
  min: number;
  max: number;
  /** `{n,m}` or `{n,}` rather than `{n}` */
  ranged: boolean;
}

export interface ResolvedQuantifier {
  distribution: Distribution;
  min: number;
  max: number;
}

function isDistributionName(value: string): value is DistributionName {
  return DISTRIBUTION_NAMES.some((name) => name === value);
}

function constructName(name: DistributionName): string {
  return `${DISPLAY_NAMES[name]} distribution`;
}

function lookupName(annotation: RawAnnotation): DistributionName {
  const name = annotation.name.toLowerCase();
  if (!isDistributionName(name)) {
    throw new PatternValidationError(
      `unknown distribution '${annotation.name}', expected one of ${Object.values(DISPLAY_NAMES).join(", ")}`,
      annotation.position,
      "distribution",
    );
  }
  return name;
}

/**
 * Run a constructor, reporting its rejection at the annotation's position
 */
function construct<T extends Distribution>(
  name: DistributionName,
  annotation: RawAnnotation,
  build: () => T,
): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof DistributionError) {
      throw new PatternValidationError(
        error.message,
        annotation.position,
        constructName(name),
        { cause: error },
      );
    }
    throw error;
  }
}

function assignSlots(
  name: Exclude<DistributionName, "cat">,
  annotation: RawAnnotation,
): Map<string, number> {
  const slots = PARAM_SLOTS[name];
  const values = new Map<string, number>();
  const positional = annotation.params.filter((param) => param.type === "positional");

  if (positional.length > slots.length) {
    throw new PatternValidationError(
      `expects at most ${slots.length} parameter(s) (${slots.join(", ")}), got ${positional.length}`,
      annotation.position,
      constructName(name),
    );
  }

  positional.forEach((param, index) => {
    const slot = slots[index];
    if (slot !== undefined) {
      values.set(slot, param.value);
    }
  });

  for (const param of annotation.params) {
    if (param.type !== "named") continue;
    if (!slots.includes(param.key)) {
      throw new PatternValidationError(
        `unknown parameter '${param.key}', expected one of ${slots.join(", ")}`,
        param.position,
        constructName(name),
      );
    }
    if (values.has(param.key)) {
      throw new PatternValidationError(
        `parameter '${param.key}' is assigned more than once`,
        param.position,
        constructName(name),
      );
    }
    values.set(param.key, param.value);
  }

  return values;
}

/**
 * Categorical weights over `outcomes` slots.
 *
 * Positional values fill outcomes in order and keys map to an outcome via
 * `indexOfKey`. A `.` key sets every outcome left unassigned; without one,
 * unassigned outcomes share whatever mass is left below 1.
 */
function buildWeights(
  annotation: RawAnnotation,
  outcomes: number,
  indexOfKey: (key: string) => number | undefined,
): number[] {
  const assigned: (number | undefined)[] = new Array<number | undefined>(outcomes).fill(
    undefined,
  );
  let remainder: number | undefined;
  let positionalIndex = 0;

  const place = (param: RawParam, index: number | undefined, label: string): void => {
    if (index === undefined || index >= outcomes) {
      throw new PatternValidationError(
        `${label} does not name one of the ${outcomes} outcome(s)`,
        param.position,
        constructName("cat"),
      );
    }
    if (assigned[index] !== undefined) {
      throw new PatternValidationError(
        `outcome ${index} is assigned more than once`,
        param.position,
        constructName("cat"),
      );
    }
    assigned[index] = param.value;
  };

  for (const param of annotation.params) {
    if (param.type === "positional") {
      place(param, positionalIndex, `weight ${positionalIndex + 1}`);
      positionalIndex++;
    }
  }

  for (const param of annotation.params) {
    if (param.type !== "named") continue;
    if (param.key === ".") {
      if (remainder !== undefined) {
        throw new PatternValidationError(
          "parameter '.' is assigned more than once",
          param.position,
          constructName("cat"),
        );
      }
      remainder = param.value;
      continue;
    }
    place(param, indexOfKey(param.key), `key '${param.key}'`);
  }

  let explicit = 0;
  let unassigned = 0;
  for (const weight of assigned) {
    if (weight === undefined) {
      unassigned++;
    } else {
      explicit += weight;
    }
  }

  const fill = remainder ?? (unassigned > 0 ? Math.max(0, 1 - explicit) / unassigned : 0);
  return assigned.map((weight) => weight ?? fill);
}

function digitKeyIndex(key: string): number | undefined {
  return /^[0-9]$/.test(key) ? Number(key) : undefined;
}

/**
 * Resolve an annotation written inside `{...}`.
 *
 * For `{n~D}` the distribution replaces the literal count: the returned bounds
 * are the distribution's support. For `{n,m~D}` the written bounds stay and
 * samples are clamped into them.
 */
export function resolveQuantifierAnnotation(
  annotation: RawAnnotation,
  bounds: QuantifierBounds,
): ResolvedQuantifier {
  const name = lookupName(annotation);
  const baseline = bounds.min;
  const upperBaseline = Number.isFinite(bounds.max) ? bounds.max : bounds.min;

  let distribution: Distribution;
  if (name === "cat") {
    let outcomes = Math.max(upperBaseline + 1, 1);
    let positional = 0;
    for (const param of annotation.params) {
      if (param.type === "positional") {
        positional++;
      } else if (param.key !== ".") {
        const index = digitKeyIndex(param.key);
        if (index === undefined) {
          throw new PatternValidationError(
            `key '${param.key}' is not a repeat count; use a digit or '.'`,
            param.position,
            constructName(name),
          );
        }
        outcomes = Math.max(outcomes, index + 1);
      }
    }
    outcomes = Math.max(outcomes, positional);
    const weights = buildWeights(annotation, outcomes, digitKeyIndex);
    distribution = construct(name, annotation, () => categorical(weights));
  } else {
    const values = assignSlots(name, annotation);
    distribution = construct(name, annotation, () => {
      switch (name) {
        case "const":
          return constant(values.get("v") ?? baseline);
        case "ber":
          return bernoulli(values.get("p") ?? DEFAULT_CERTAIN_P);
        case "bin":
          return binomial(values.get("n") ?? upperBaseline, values.get("p") ?? DEFAULT_CERTAIN_P);
        case "geo":
          return geometric(values.get("p") ?? DEFAULT_P, baseline);
        case "zipf":
          return zipf(values.get("s") ?? DEFAULT_ZIPF_S, values.get("k") ?? upperBaseline);
      }
    });
  }

  if (bounds.ranged) {
    return { distribution, min: bounds.min, max: bounds.max };
  }

  const support = supportOf(distribution);
  return {
    distribution,
    min: support.min,
    max: Number.isFinite(support.max) ? support.max : UNBOUNDED,
  };
}

/**
 * Resolve an annotation written at the end of a `[...]` body.
 * The distribution draws an index into `alphabet`.
 */
export function resolveClassAnnotation(
  annotation: RawAnnotation,
  alphabet: readonly string[],
): Distribution {
  const name = lookupName(annotation);
  const size = alphabet.length;

  if (name === "cat") {
    const weights = buildWeights(annotation, size, (key) => {
      const index = alphabet.indexOf(key);
      return index >= 0 ? index : undefined;
    });
    return construct(name, annotation, () => categorical(weights));
  }

  const values = assignSlots(name, annotation);
  return construct(name, annotation, () => {
    switch (name) {
      case "const": {
        const value = values.get("v") ?? 0;
        if (value >= size) {
          throw new DistributionError(
            `constant index ${value} is outside a class of ${size} character(s)`,
            { kind: "constant", value, size },
          );
        }
        return constant(value);
      }
      case "ber":
        return bernoulli(values.get("p") ?? DEFAULT_CERTAIN_P);
      case "bin":
        return binomial(values.get("n") ?? size - 1, values.get("p") ?? DEFAULT_CERTAIN_P);
      case "geo":
        return geometric(values.get("p") ?? DEFAULT_P, 0);
      case "zipf":
        return zipf(values.get("s") ?? DEFAULT_ZIPF_S, values.get("k") ?? size);
    }
  });
}
