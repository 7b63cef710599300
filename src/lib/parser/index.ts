/**
 * Parser module - pattern text to validated AST
 */
export * from "./types.js";
export {
  parsePattern,
  MAX_GROUP_DEPTH,
  RESERVED_CHARS,
  CLASS_SPECIAL_CHARS,
} from "./parser.js";
