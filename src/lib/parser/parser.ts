/**
 * Pattern parser
 *
 * Recursive descent over the pattern grammar:
 *
 *   pattern     := "^"? alternation "$"? EOF
 *   alternation := expression ("|" expression)*
 *   expression  := factor+
 *   factor      := (token | "(" alternation ")") quantifier?
 *   quantifier  := "+" | "?" | "*" | "{" count ("," count?)? annotation? "}"
 *   token       := literal | "." | "\" char | "[" "^"? member+ annotation? "]"
 *   annotation  := "~" name ("(" param ("," param)* ")")?
 *
 * Alternations and concatenations come out as flat n-ary lists in source
 * order. Groups produce no node of their own.
 */

import type { RawAnnotation, RawParam } from "../../types/distribution.js";
import {
  UNBOUNDED,
  type CharClassNode,
  type ClassMember,
  type Pattern,
  type PatternNode,
  type QuantifiedNode,
} from "../../types/pattern.js";
import { PatternSyntaxError, PatternValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import {
  DEFAULT_ALPHABET,
  createAlphabet,
  isPosixClassName,
  isShorthandName,
} from "../charclass/alphabets.js";
import { resolveAlphabet } from "../charclass/resolve.js";
import {
  resolveClassAnnotation,
  resolveQuantifierAnnotation,
} from "../distribution/resolver.js";
import type { ParseOptions } from "./types.js";

/** Characters with grammatical meaning outside a class body */
export const RESERVED_CHARS: ReadonlySet<string> = new Set([
  "^", "$", "|", "(", ")", ".", "\\", "+", "?", "*", "{", "}", "[", "]", "~", ",", "=",
]);

/** Characters with grammatical meaning inside a class body */
export const CLASS_SPECIAL_CHARS: ReadonlySet<string> = new Set(["]", "\\", ".", "~", "["]);

const FACTOR_EXPECTED = "literal, '.', character class or group";

/** Deepest group nesting the parser accepts */
export const MAX_GROUP_DEPTH = 256;
const NUMBER = /^-?(?:\d+(?:\.\d+)?|\.\d+)/;
const LETTER = /^[A-Za-z]$/;
const DIGIT = /^[0-9]$/;

function isQuantifierStart(ch: string | undefined): boolean {
  return ch === "+" || ch === "?" || ch === "*" || ch === "{";
}

function describe(ch: string | undefined): string {
  return ch === undefined ? "end of input" : `'${ch}'`;
}

class PatternParser {
  // Code points, so positions line up with what a user sees
  private readonly chars: string[];
  private pos = 0;
  private depth = 0;

  constructor(
    private readonly source: string,
    private readonly universe: readonly string[],
  ) {
    this.chars = Array.from(source);
  }

  parse(): Pattern {
    let anchoredStart = false;
    if (this.peek() === "^") {
      anchoredStart = true;
      this.pos++;
    }

    const root = this.parseAlternation();

    let anchoredEnd = false;
    if (this.peek() === "$" && this.pos === this.chars.length - 1) {
      anchoredEnd = true;
      this.pos++;
    }

    if (this.pos < this.chars.length) {
      const ch = this.peek();
      throw new PatternSyntaxError(
        ch === ")" ? "unmatched ')'" : `unexpected ${describe(ch)}`,
        this.pos,
        "end of input",
      );
    }

    return {
      root,
      anchoredStart,
      anchoredEnd,
      alphabet: this.universe,
      source: this.source,
    };
  }

  private peek(offset = 0): string | undefined {
    return this.chars[this.pos + offset];
  }

  private canStartFactor(): boolean {
    const ch = this.peek();
    if (ch === undefined || ch === "|" || ch === ")") return false;
    // A trailing '$' is the end anchor
    return !(ch === "$" && this.pos === this.chars.length - 1);
  }

  private parseAlternation(): PatternNode {
    const branches: PatternNode[] = [this.parseExpression()];
    while (this.peek() === "|") {
      this.pos++;
      branches.push(this.parseExpression());
    }
    return branches.length === 1 && branches[0] !== undefined
      ? branches[0]
      : { type: "alternation", branches };
  }

  private parseExpression(): PatternNode {
    const start = this.pos;
    const factors: PatternNode[] = [];

    while (this.canStartFactor()) {
      const factor = this.parseFactor();
      // Concatenation is associative: a spliced group's sequence joins ours
      if (factor.type === "concat") {
        factors.push(...factor.children);
      } else {
        factors.push(factor);
      }
    }

    if (factors.length === 0) {
      const ch = this.peek();
      let reason = "empty pattern";
      if (ch === "|" || this.chars[start - 1] === "|") {
        reason = "empty alternative";
      } else if (ch === ")" && this.depth === 0) {
        reason = "unmatched ')'";
      }
      throw new PatternSyntaxError(reason, this.pos, "expression");
    }

    return factors.length === 1 && factors[0] !== undefined
      ? factors[0]
      : { type: "concat", children: factors };
  }

  private parseFactor(): PatternNode {
    const ch = this.peek();
    if (isQuantifierStart(ch)) {
      throw new PatternSyntaxError(
        `dangling quantifier ${describe(ch)} has nothing to repeat`,
        this.pos,
        FACTOR_EXPECTED,
      );
    }

    const atom = ch === "(" ? this.parseGroup() : this.parseToken();
    if (!isQuantifierStart(this.peek())) {
      return atom;
    }

    const quantified = this.parseQuantifier(atom);
    if (isQuantifierStart(this.peek())) {
      throw new PatternSyntaxError(
        `dangling quantifier ${describe(this.peek())} follows another quantifier`,
        this.pos,
        FACTOR_EXPECTED,
      );
    }
    return quantified;
  }

  private parseGroup(): PatternNode {
    const open = this.pos;
    if (this.depth >= MAX_GROUP_DEPTH) {
      throw new PatternSyntaxError(
        `groups nested too deeply (limit ${MAX_GROUP_DEPTH})`,
        open,
        "shallower group nesting",
      );
    }
    this.pos++; // consume '('

    if (this.peek() === ")") {
      throw new PatternSyntaxError("empty group", this.pos, "expression");
    }
    if (this.peek() === undefined) {
      throw new PatternSyntaxError("unmatched '('", open, "')'");
    }

    this.depth++;
    const inner = this.parseAlternation();
    this.depth--;

    if (this.peek() !== ")") {
      throw new PatternSyntaxError("unmatched '('", open, "')'");
    }
    this.pos++;
    return inner;
  }

  private parseToken(): PatternNode {
    const start = this.pos;
    const ch = this.peek();

    if (ch === undefined) {
      throw new PatternSyntaxError("unexpected end of input", start, FACTOR_EXPECTED);
    }

    if (ch === ".") {
      this.pos++;
      return { type: "wildcard" };
    }

    if (ch === "[") {
      return this.parseBracketClass();
    }

    if (ch === "\\") {
      const member = this.parseEscape();
      return member.kind === "literal"
        ? { type: "literal", char: member.char }
        : this.buildClass([member], false, undefined, start);
    }

    if (RESERVED_CHARS.has(ch)) {
      throw new PatternSyntaxError(`unexpected '${ch}'`, start, FACTOR_EXPECTED);
    }

    this.pos++;
    return { type: "literal", char: ch };
  }

  /**
   * `\w`, `\s` and `\d` are shorthand classes; any other escaped character is literal
   */
  private parseEscape(): Extract<ClassMember, { kind: "shorthand" | "literal" }> {
    const start = this.pos;
    this.pos++; // consume '\'
    const ch = this.peek();

    if (ch === undefined) {
      throw new PatternSyntaxError("escape at end of input", start, "character after '\\'");
    }
    this.pos++;

    return isShorthandName(ch) ? { kind: "shorthand", name: ch } : { kind: "literal", char: ch };
  }

  private parseBracketClass(): CharClassNode {
    const open = this.pos;
    this.pos++; // consume '['

    let negated = false;
    if (this.peek() === "^") {
      negated = true;
      this.pos++;
    }

    const members: ClassMember[] = [];
    let annotation: RawAnnotation | undefined;

    for (;;) {
      const ch = this.peek();
      if (ch === undefined) {
        throw new PatternSyntaxError("unmatched '['", open, "']'");
      }
      if (ch === "]" || ch === "~") {
        if (members.length === 0) {
          throw new PatternSyntaxError("empty character class", this.pos, "class member");
        }
        if (ch === "~") {
          annotation = this.parseAnnotation();
          if (this.peek() === undefined) {
            throw new PatternSyntaxError("unmatched '['", open, "']'");
          }
          if (this.peek() !== "]") {
            throw new PatternSyntaxError(
              `unexpected ${describe(this.peek())} after distribution`,
              this.pos,
              "']'",
            );
          }
        }
        this.pos++; // consume ']'
        break;
      }
      members.push(this.parseClassMember(ch));
    }

    return this.buildClass(members, negated, annotation, open);
  }

  private parseClassMember(ch: string): ClassMember {
    if (ch === ".") {
      this.pos++;
      return { kind: "wildcard" };
    }

    if (ch === "\\") {
      return this.parseEscape();
    }

    if (ch === "[" && this.peek(1) === ":") {
      return this.parsePosixClass();
    }

    this.pos++;
    return { kind: "literal", char: ch };
  }

  private parsePosixClass(): ClassMember {
    const start = this.pos;
    this.pos += 2; // consume '[:'

    let name = "";
    while (LETTER.test(this.peek() ?? "")) {
      name += this.peek();
      this.pos++;
    }

    if (this.peek() !== ":" || this.peek(1) !== "]") {
      throw new PatternSyntaxError("unterminated posix class", start, "':]'");
    }
    this.pos += 2;

    if (!isPosixClassName(name)) {
      throw new PatternSyntaxError(
        `unknown posix class '[:${name}:]'`,
        start,
        "posix class name",
      );
    }
    return { kind: "posix", name };
  }

  private buildClass(
    members: ClassMember[],
    negated: boolean,
    annotation: RawAnnotation | undefined,
    position: number,
  ): CharClassNode {
    const alphabet = resolveAlphabet(members, negated, this.universe);
    if (alphabet.length === 0) {
      throw new PatternValidationError(
        "class admits no characters",
        position,
        "character class",
      );
    }

    if (!annotation) {
      return { type: "charclass", members, negated, alphabet };
    }
    return {
      type: "charclass",
      members,
      negated,
      alphabet,
      distribution: resolveClassAnnotation(annotation, alphabet),
    };
  }

  private parseQuantifier(child: PatternNode): QuantifiedNode {
    const ch = this.peek();
    if (ch === "{") {
      return this.parseLongQuantifier(child);
    }

    this.pos++;
    switch (ch) {
      case "+":
        return { type: "quantified", child, min: 1, max: UNBOUNDED };
      case "*":
        return { type: "quantified", child, min: 0, max: UNBOUNDED };
      default:
        return { type: "quantified", child, min: 0, max: 1 };
    }
  }

  private parseLongQuantifier(child: PatternNode): QuantifiedNode {
    const open = this.pos;
    this.pos++; // consume '{'

    const min = this.parseCount();
    let max = min;
    let ranged = false;

    if (this.peek() === ",") {
      this.pos++;
      ranged = true;
      max = DIGIT.test(this.peek() ?? "") ? this.parseCount() : UNBOUNDED;
    }

    let annotation: RawAnnotation | undefined;
    if (this.peek() === "~") {
      annotation = this.parseAnnotation();
    }

    if (this.peek() !== "}") {
      if (this.peek() === undefined) {
        throw new PatternSyntaxError("unmatched '{'", open, "'}'");
      }
      throw new PatternSyntaxError(
        `unexpected ${describe(this.peek())} in repeat`,
        this.pos,
        "'}'",
      );
    }
    this.pos++;

    if (min > max) {
      throw new PatternValidationError(
        `lower bound ${min} exceeds upper bound ${max}`,
        open,
        "repeat bounds",
      );
    }

    if (!annotation) {
      return { type: "quantified", child, min, max };
    }

    const resolved = resolveQuantifierAnnotation(annotation, { min, max, ranged });
    return {
      type: "quantified",
      child,
      min: resolved.min,
      max: resolved.max,
      distribution: resolved.distribution,
    };
  }

  private parseCount(): number {
    const start = this.pos;
    let digits = "";
    while (DIGIT.test(this.peek() ?? "")) {
      digits += this.peek();
      this.pos++;
    }

    if (digits.length === 0) {
      throw new PatternSyntaxError(
        `expected a repeat count but found ${describe(this.peek())}`,
        start,
        "digit",
      );
    }

    const count = Number(digits);
    if (!Number.isSafeInteger(count)) {
      throw new PatternSyntaxError(`repeat count ${digits} is too large`, start, "digit");
    }
    return count;
  }

  private parseAnnotation(): RawAnnotation {
    const start = this.pos;
    this.pos++; // consume '~'

    let name = "";
    while (LETTER.test(this.peek() ?? "")) {
      name += this.peek();
      this.pos++;
    }

    if (name.length === 0) {
      throw new PatternSyntaxError(
        `expected a distribution name after '~' but found ${describe(this.peek())}`,
        this.pos,
        "distribution name",
      );
    }

    const params: RawParam[] = [];
    if (this.peek() === "(") {
      const open = this.pos;
      this.pos++;
      this.skipSpaces();

      if (this.peek() !== ")") {
        for (;;) {
          params.push(this.parseParam());
          this.skipSpaces();
          if (this.peek() !== ",") break;
          this.pos++;
          this.skipSpaces();
        }
      }

      if (this.peek() !== ")") {
        if (this.peek() === undefined) {
          throw new PatternSyntaxError("unmatched '('", open, "')'");
        }
        throw new PatternSyntaxError(
          `unexpected ${describe(this.peek())} in distribution parameters`,
          this.pos,
          "',' or ')'",
        );
      }
      this.pos++;
    }

    return { name, params, position: start };
  }

  private parseParam(): RawParam {
    const start = this.pos;
    const key = this.peek();

    if (key !== undefined && this.peek(1) === "=" && !/[\s,()=]/.test(key)) {
      this.pos += 2;
      return { type: "named", key, value: this.parseNumber(), position: start };
    }
    return { type: "positional", value: this.parseNumber(), position: start };
  }

  private parseNumber(): number {
    const match = NUMBER.exec(this.chars.slice(this.pos).join(""));
    if (!match) {
      throw new PatternSyntaxError(
        `expected a number but found ${describe(this.peek())}`,
        this.pos,
        "number",
      );
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private skipSpaces(): void {
    while (this.peek() === " ") {
      this.pos++;
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Parse pattern text into a frozen Pattern
 *
 * @throws PatternSyntaxError when the text does not follow the grammar
 * @throws PatternValidationError when a distribution or bound is invalid
 *
 * @example
 * const pattern = parsePattern("a{3~Geo(0.2)}");
 */
export function parsePattern(text: string, options: ParseOptions = {}): Pattern {
  const universe =
    options.alphabet !== undefined ? createAlphabet(options.alphabet) : DEFAULT_ALPHABET;
  if (universe.length === 0) {
    throw new PatternValidationError("alphabet is empty", 0, "alphabet");
  }

  const pattern = new PatternParser(text, universe).parse();
  logger.debug("Pattern parsed", {
    source: text,
    root: pattern.root.type,
    anchoredStart: pattern.anchoredStart,
    anchoredEnd: pattern.anchoredEnd,
  });

  return deepFreeze(pattern);
}
