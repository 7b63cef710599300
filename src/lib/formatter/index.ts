/**
 * Pattern formatter - renders an AST back into canonical pattern text.
 *
 * Distributions are written with every parameter named and long quantifiers
 * carrying one are written in range form, so parsing the output gives back
 * an equal tree.
 */

import type { Distribution } from "../../types/distribution.js";
import type {
  CharClassNode,
  ClassMember,
  Pattern,
  PatternNode,
  QuantifiedNode,
} from "../../types/pattern.js";
import { DISPLAY_NAMES, NAME_BY_KIND } from "../distribution/resolver.js";
import { CLASS_SPECIAL_CHARS, RESERVED_CHARS } from "../parser/parser.js";

const SHORTHAND_LETTERS = new Set(["w", "s", "d"]);

export function formatNumber(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) {
    return text;
  }
  // The pattern grammar has no exponent notation
  return value.toFixed(20).replace(/0+$/, "").replace(/\.$/, "");
}

export function formatDistribution(dist: Distribution): string {
  const name = DISPLAY_NAMES[NAME_BY_KIND[dist.kind]];
  let params: string[];

  switch (dist.kind) {
    case "constant":
      params = [`v=${formatNumber(dist.value)}`];
      break;
    case "bernoulli":
      params = [`p=${formatNumber(dist.p)}`];
      break;
    case "binomial":
      params = [`p=${formatNumber(dist.p)}`, `n=${formatNumber(dist.n)}`];
      break;
    case "categorical":
      params = dist.weights.map(formatNumber);
      break;
    case "geometric":
      params = [`p=${formatNumber(dist.p)}`];
      break;
    case "zipf":
      params = [`s=${formatNumber(dist.s)}`, `k=${formatNumber(dist.k)}`];
      break;
  }

  return `~${name}(${params.join(",")})`;
}

function escapeLiteral(char: string): string {
  return RESERVED_CHARS.has(char) ? `\\${char}` : char;
}

function formatMember(member: ClassMember, index: number): string {
  switch (member.kind) {
    case "shorthand":
      return `\\${member.name}`;
    case "posix":
      return `[:${member.name}:]`;
    case "wildcard":
      return ".";
    case "literal":
      // A leading '^' would read as negation
      if (
        CLASS_SPECIAL_CHARS.has(member.char) ||
        (index === 0 && member.char === "^")
      ) {
        return `\\${member.char}`;
      }
      return member.char;
  }
}

function formatClass(node: CharClassNode): string {
  const [only] = node.members;
  if (
    node.members.length === 1 &&
    only?.kind === "shorthand" &&
    !node.negated &&
    !node.distribution
  ) {
    return `\\${only.name}`;
  }

  const body = node.members.map(formatMember).join("");
  const annotation = node.distribution ? formatDistribution(node.distribution) : "";
  return `[${node.negated ? "^" : ""}${body}${annotation}]`;
}

function formatQuantifier(node: QuantifiedNode): string {
  const { min, max, distribution } = node;
  const upper = Number.isFinite(max) ? String(max) : "";

  if (distribution) {
    return `{${min},${upper}${formatDistribution(distribution)}}`;
  }
  if (min === 0 && max === 1) return "?";
  if (min === 0 && !Number.isFinite(max)) return "*";
  if (min === 1 && !Number.isFinite(max)) return "+";
  if (min === max) return `{${min}}`;
  return `{${min},${upper}}`;
}

function isAtom(node: PatternNode): boolean {
  return node.type === "literal" || node.type === "wildcard" || node.type === "charclass";
}

export function formatNode(node: PatternNode): string {
  switch (node.type) {
    case "literal":
      return escapeLiteral(node.char);
    case "wildcard":
      return ".";
    case "charclass":
      return formatClass(node);
    case "concat":
      return node.children
        .map((child) => (child.type === "alternation" ? `(${formatNode(child)})` : formatNode(child)))
        .join("");
    case "alternation":
      return node.branches
        .map((branch) =>
          branch.type === "alternation" ? `(${formatNode(branch)})` : formatNode(branch),
        )
        .join("|");
    case "quantified": {
      const child = isAtom(node.child) ? formatNode(node.child) : `(${formatNode(node.child)})`;
      return child + formatQuantifier(node);
    }
  }
}

/**
 * Canonical text for a pattern, anchors included
 */
export function formatPattern(pattern: Pattern): string {
  return `${pattern.anchoredStart ? "^" : ""}${formatNode(pattern.root)}${pattern.anchoredEnd ? "$" : ""}`;
}
