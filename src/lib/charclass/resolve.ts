import type { ClassMember } from "../../types/pattern.js";
import { POSIX_CLASSES, SHORTHAND_CLASSES } from "./alphabets.js";

export function memberChars(
  member: ClassMember,
  universe: readonly string[],
): readonly string[] {
  switch (member.kind) {
    case "shorthand":
      return SHORTHAND_CLASSES[member.name];
    case "posix":
      return POSIX_CLASSES[member.name];
    case "literal":
      return [member.char];
    case "wildcard":
      return universe;
  }
}

/**
 * Effective alphabet of a class: the union of its members in first-occurrence
 * order, or, when negated, every universe character outside that union.
 */
export function resolveAlphabet(
  members: readonly ClassMember[],
  negated: boolean,
  universe: readonly string[],
): string[] {
  const union = new Set<string>();
  for (const member of members) {
    for (const char of memberChars(member, universe)) {
      union.add(char);
    }
  }

  if (negated) {
    return universe.filter((char) => !union.has(char));
  }
  return Array.from(union);
}
