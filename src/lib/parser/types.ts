/**
 * Parser module types
 */

export interface ParseOptions {
  /**
   * Universe for `.` and negated classes, as a string or a list of
   * characters. Defaults to printable ASCII.
   */
  alphabet?: string | readonly string[];
}
