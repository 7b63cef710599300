/**
 * Character sets behind shorthand classes, posix classes and the wildcard.
 * Every set is listed in code point order, which fixes the member index a
 * class distribution selects.
 */

import type { PosixClassName, ShorthandName } from "../../types/pattern.js";

function charRange(from: string, to: string): string[] {
  const chars: string[] = [];
  for (let code = from.charCodeAt(0); code <= to.charCodeAt(0); code++) {
    chars.push(String.fromCharCode(code));
  }
  return chars;
}

const DIGITS = charRange("0", "9");
const UPPER = charRange("A", "Z");
const LOWER = charRange("a", "z");
const SPACE = ["\t", "\n", "\v", "\f", "\r", " "];
const PRINTABLE = charRange(" ", "~");
const WORD = [...DIGITS, ...UPPER, "_", ...LOWER];

/**
 * Universe for `.` and negated classes unless the caller supplies one:
 * printable ASCII, 0x20 through 0x7E.
 */
export const DEFAULT_ALPHABET: readonly string[] = Object.freeze([...PRINTABLE]);

export const SHORTHAND_CLASSES: Readonly<Record<ShorthandName, readonly string[]>> = {
  w: WORD,
  s: SPACE,
  d: DIGITS,
};

export const POSIX_CLASSES: Readonly<Record<PosixClassName, readonly string[]>> = {
  alpha: [...UPPER, ...LOWER],
  digit: DIGITS,
  alnum: [...DIGITS, ...UPPER, ...LOWER],
  upper: UPPER,
  lower: LOWER,
  space: SPACE,
  blank: ["\t", " "],
  punct: PRINTABLE.filter((c) => !/[0-9A-Za-z ]/.test(c)),
  xdigit: [...DIGITS, ...charRange("A", "F"), ...charRange("a", "f")],
  word: WORD,
  print: PRINTABLE,
  graph: PRINTABLE.filter((c) => c !== " "),
};

export function isShorthandName(value: string): value is ShorthandName {
  return value === "w" || value === "s" || value === "d";
}

export function isPosixClassName(value: string): value is PosixClassName {
  return Object.prototype.hasOwnProperty.call(POSIX_CLASSES, value);
}

/**
 * Build a universe from a string of characters, keeping first occurrences
 */
export function createAlphabet(chars: string | readonly string[]): string[] {
  const list = typeof chars === "string" ? Array.from(chars) : chars;
  return Array.from(new Set(list));
}
