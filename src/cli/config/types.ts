/**
 * CLI configuration types
 */

import type { OutputFormat } from "../../lib/emitter/types.js";

/**
 * Output configuration
 */
export interface OutputConfig {
  format: OutputFormat;
  /** File path, or "stdout" */
  path: string;
}

/**
 * Generate command configuration, after merging and defaults
 */
export interface GenerateConfig {
  pattern: string;
  count: number;
  seed?: string;
  /** Upper repeat bound for unbounded quantifiers */
  maxRepeat: number;
  /** Universe for '.' and negated classes; printable ASCII when absent */
  alphabet?: string;
  batchSize: number;
  output: OutputConfig;
}

/**
 * `generate` section of a configuration file. Every key is optional.
 */
export interface GenerateConfigSection {
  pattern?: string;
  count?: number;
  seed?: string;
  maxRepeat?: number;
  alphabet?: string;
  batchSize?: number;
  output?: Partial<OutputConfig>;
}

/**
 * Complete configuration file structure
 */
export interface RegsynthConfig {
  generate?: GenerateConfigSection;
}

/**
 * Options commander hands to the generate action
 */
export interface GenerateCommandOptions {
  count?: number;
  seed?: string;
  maxRepeat?: number;
  alphabet?: string;
  batchSize?: number;
  outputFormat?: string;
  outputPath?: string;
  config?: string;
}
