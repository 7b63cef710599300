/**
 * Configuration loader for the generate command
 */

import type {
  GenerateCommandOptions,
  GenerateConfig,
  GenerateConfigSection,
} from "../cli/config/types.js";
import { isOutputFormat } from "../lib/emitter/types.js";
import { DEFAULT_MAX_REPEAT } from "../lib/generator/engine.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_GENERATE_CONFIG: Omit<GenerateConfig, "pattern"> = {
  count: 10,
  maxRepeat: DEFAULT_MAX_REPEAT,
  batchSize: 100,
  output: {
    format: "text",
    path: "stdout",
  },
};

/**
 * Merge CLI options with a config file section
 *
 * @param patternArg - pattern given on the command line, if any
 * @param cliOptions - CLI flags
 * @param configFile - Optional `generate` section of the config file
 * @returns Merged configuration with defaults applied
 *
 * @example
 * const config = loadGenerateConfig("a{3}", { count: 5 }, { count: 100, seed: "s" });
 * // Returns: count 5 (CLI takes precedence), seed "s" (from file)
 */
export function loadGenerateConfig(
  patternArg: string | undefined,
  cliOptions: GenerateCommandOptions = {},
  configFile: GenerateConfigSection = {},
): GenerateConfig {
  const pattern = patternArg ?? configFile.pattern;
  if (pattern === undefined) {
    throw new ConfigError(
      "No pattern given: pass one as an argument or set generate.pattern in the config file",
    );
  }

  const format =
    cliOptions.outputFormat ??
    configFile.output?.format ??
    DEFAULT_GENERATE_CONFIG.output.format;
  if (!isOutputFormat(format)) {
    throw new ConfigError(`Unsupported output format: ${format}`, { format });
  }

  // Precedence: CLI > config file > defaults
  const config: GenerateConfig = {
    pattern,
    count: cliOptions.count ?? configFile.count ?? DEFAULT_GENERATE_CONFIG.count,
    seed: cliOptions.seed ?? configFile.seed,
    maxRepeat:
      cliOptions.maxRepeat ?? configFile.maxRepeat ?? DEFAULT_GENERATE_CONFIG.maxRepeat,
    alphabet: cliOptions.alphabet ?? configFile.alphabet,
    batchSize:
      cliOptions.batchSize ?? configFile.batchSize ?? DEFAULT_GENERATE_CONFIG.batchSize,
    output: {
      format,
      path:
        cliOptions.outputPath ??
        configFile.output?.path ??
        DEFAULT_GENERATE_CONFIG.output.path,
    },
  };

  validateGenerateConfig(config);

  logger.debug("Generate config loaded", {
    count: config.count,
    maxRepeat: config.maxRepeat,
    format: config.output.format,
    seeded: config.seed !== undefined,
  });

  return config;
}

/**
 * Validate generate configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateGenerateConfig(config: GenerateConfig): void {
  if (config.pattern.length === 0) {
    throw new ConfigError("pattern must not be empty");
  }

  if (!Number.isSafeInteger(config.count) || config.count < 0) {
    throw new ConfigError(`count must be an integer >= 0, got ${config.count}`, {
      count: config.count,
    });
  }

  if (!Number.isSafeInteger(config.maxRepeat) || config.maxRepeat < 0) {
    throw new ConfigError(`maxRepeat must be an integer >= 0, got ${config.maxRepeat}`, {
      maxRepeat: config.maxRepeat,
    });
  }

  if (!Number.isSafeInteger(config.batchSize) || config.batchSize < 1) {
    throw new ConfigError(`batchSize must be an integer >= 1, got ${config.batchSize}`, {
      batchSize: config.batchSize,
    });
  }

  if (config.alphabet !== undefined && config.alphabet.length === 0) {
    throw new ConfigError("alphabet must contain at least one character");
  }

  if (config.output.path.length === 0) {
    throw new ConfigError("output path must not be empty");
  }
}
