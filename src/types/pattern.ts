/**
 * Pattern AST
 *
 * The parser produces these nodes, the generation engine and the formatter
 * consume them. Nodes are frozen once the parser returns a Pattern.
 */

import type { Distribution } from "./distribution.js";

/** Upper bound of `*`, `+` and `{n,}` */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

export type ShorthandName = "w" | "s" | "d";

export type PosixClassName =
  | "alpha"
  | "digit"
  | "alnum"
  | "upper"
  | "lower"
  | "space"
  | "blank"
  | "punct"
  | "xdigit"
  | "word"
  | "print"
  | "graph";

/**
 * One entry of a character class body, as written
 */
export type ClassMember =
  | { readonly kind: "shorthand"; readonly name: ShorthandName }
  | { readonly kind: "posix"; readonly name: PosixClassName }
  | { readonly kind: "literal"; readonly char: string }
  | { readonly kind: "wildcard" };

export interface LiteralNode {
  readonly type: "literal";
  readonly char: string;
}

export interface WildcardNode {
  readonly type: "wildcard";
}

export interface CharClassNode {
  readonly type: "charclass";
  readonly members: readonly ClassMember[];
  readonly negated: boolean;
  /** Effective members: de-duplicated, complemented against the universe when negated */
  readonly alphabet: readonly string[];
  /** Picks a member index; uniform when absent */
  readonly distribution?: Distribution;
}

export interface ConcatNode {
  readonly type: "concat";
  readonly children: readonly PatternNode[];
}

export interface AlternationNode {
  readonly type: "alternation";
  readonly branches: readonly PatternNode[];
}

export interface QuantifiedNode {
  readonly type: "quantified";
  readonly child: PatternNode;
  readonly min: number;
  /** Integer, or UNBOUNDED */
  readonly max: number;
  /** Repeat-count distribution; samples are clamped into [min, max] */
  readonly distribution?: Distribution;
}

export type PatternNode =
  | LiteralNode
  | WildcardNode
  | CharClassNode
  | ConcatNode
  | AlternationNode
  | QuantifiedNode;

export type PatternNodeType = PatternNode["type"];

/**
 * Parse root
 */
export interface Pattern {
  readonly root: PatternNode;
  readonly anchoredStart: boolean;
  readonly anchoredEnd: boolean;
  /** Universe used for wildcards and negated classes */
  readonly alphabet: readonly string[];
  /** Pattern text this tree was parsed from */
  readonly source: string;
}
