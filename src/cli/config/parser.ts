/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isOutputFormat } from "../../lib/emitter/types.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { GenerateConfigSection, OutputConfig, RegsynthConfig } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  section: Record<string, unknown>,
  key: string,
  path: string,
): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  // YAML reads bare numbers as numbers; seeds and alphabets are text
  if (typeof value === "number" && key !== "pattern") return String(value);
  if (typeof value !== "string") {
    throw new ConfigError(`${path}.${key} must be a string`, { key, value });
  }
  return value;
}

function optionalInteger(
  section: Record<string, unknown>,
  key: string,
  path: string,
): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new ConfigError(`${path}.${key} must be an integer`, { key, value });
  }
  return value;
}

function readOutputSection(value: unknown): Partial<OutputConfig> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError("generate.output must be a mapping");
  }

  const output: Partial<OutputConfig> = {};
  const format = optionalString(value, "format", "generate.output");
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      throw new ConfigError(`Unsupported output format: ${format}`, { format });
    }
    output.format = format;
  }
  const path = optionalString(value, "path", "generate.output");
  if (path !== undefined) {
    output.path = path;
  }
  return output;
}

/**
 * Check the shape of a parsed configuration document
 */
export function readConfigDocument(document: unknown): RegsynthConfig {
  if (document === null || document === undefined) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigError("Configuration must be a mapping");
  }

  const section = document.generate;
  if (section === undefined) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigError("generate section must be a mapping");
  }

  const generate: GenerateConfigSection = {
    pattern: optionalString(section, "pattern", "generate"),
    count: optionalInteger(section, "count", "generate"),
    seed: optionalString(section, "seed", "generate"),
    maxRepeat: optionalInteger(section, "maxRepeat", "generate"),
    alphabet: optionalString(section, "alphabet", "generate"),
    batchSize: optionalInteger(section, "batchSize", "generate"),
    output: readOutputSection(section.output),
  };
  return { generate };
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): RegsynthConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = readConfigDocument(document);
  logger.info("Configuration file parsed successfully", {
    hasGenerateConfig: !!config.generate,
  });
  return config;
}
