/**
 * Generator module types
 */

export interface GenerateOptions {
  /**
   * Upper repeat bound used when a quantifier is unbounded (`*`, `+`, `{n,}`).
   * Defaults to DEFAULT_MAX_REPEAT.
   */
  maxRepeat?: number;
}

export interface SampleStreamOptions extends GenerateOptions {
  /** Strings generated per `_read` call */
  batchSize?: number;
}
