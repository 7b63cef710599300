import { Command, InvalidArgumentError } from "commander";
import { createWriteStream } from "fs";
import type { Writable } from "stream";
import { pipeline } from "stream/promises";
import { createFormatWriter } from "../../lib/emitter/index.js";
import { createSampleStream } from "../../lib/generator/stream.js";
import { parsePattern } from "../../lib/parser/parser.js";
import { RegsynthError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { loadGenerateConfig } from "../../utils/config-loader.js";
import { createRandomSource, generateRandomSeed } from "../../utils/seed-manager.js";

import { parseConfigFile } from "../config/parser.js";
import type {
  GenerateCommandOptions,
  GenerateConfig,
  GenerateConfigSection,
} from "../config/types.js";

export type GenerateSummary = {
  status: "success";
  phase: "generation";
  output: {
    totalStrings: number;
    format: string;
    path: string;
  };
  seed: string;
  metrics: {
    durationMs: number;
  };
};

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parsed;
}

/**
 * Generate `config.count` strings and write them in the configured format.
 *
 * @param stdout - sink used when the output path is "stdout"
 */
export async function runGenerate(
  config: GenerateConfig,
  stdout: Writable = process.stdout,
): Promise<GenerateSummary> {
  const startTime = Date.now();
  const pattern = parsePattern(config.pattern, { alphabet: config.alphabet });

  // Report the seed so an unseeded run can be replayed
  const seed = config.seed ?? generateRandomSeed();
  const random = createRandomSource(seed);

  logger.info("Generating strings", {
    count: config.count,
    format: config.output.format,
    path: config.output.path,
  });

  const source = createSampleStream(pattern, config.count, random, {
    batchSize: config.batchSize,
    maxRepeat: config.maxRepeat,
  });
  const formatWriter = createFormatWriter(config.output.format);

  const outputStream =
    config.output.path === "stdout" ? stdout : createWriteStream(config.output.path);
  await pipeline(source, formatWriter, outputStream);

  return {
    status: "success",
    phase: "generation",
    output: {
      totalStrings: config.count,
      format: config.output.format,
      path: config.output.path,
    },
    seed,
    metrics: {
      durationMs: Date.now() - startTime,
    },
  };
}

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate random strings from a pattern")
    .argument("[pattern]", "Pattern to generate from")
    .option("-n, --count <number>", "Number of strings to generate", parseInteger)
    .option("--seed <seed>", "Seed for deterministic generation")
    .option(
      "--max-repeat <number>",
      "Upper repeat bound for *, + and {n,}",
      parseInteger,
    )
    .option("--alphabet <chars>", "Characters '.' and negated classes draw from")
    .option("--output-format <format>", "Output format: text, ndjson, json")
    .option("--output-path <path>", 'Output path (or "stdout")')
    .option("--batch-size <number>", "Strings generated per stream read", parseInteger)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (patternArg: string | undefined, opts: GenerateCommandOptions) => {
      try {
        // Parse config file if provided
        let configFile: GenerateConfigSection | undefined;
        if (opts.config) {
          configFile = parseConfigFile(opts.config).generate;
        }

        const config = loadGenerateConfig(patternArg, opts, configFile);
        const result = await runGenerate(config);

        // Keep stdout clean when it carries the strings
        if (config.output.path === "stdout") {
          logger.info("Generation complete", result);
        } else {
          console.log(JSON.stringify(result, null, 2));
        }
      } catch (error) {
        if (error instanceof RegsynthError) {
          console.error(JSON.stringify(error.toResponse("generation"), null, 2));
        } else {
          logger.error("Generate command error", {
            error: error instanceof Error ? error.message : String(error),
          });
        }
        process.exitCode = 1;
      }
    });
}
