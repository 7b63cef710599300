#!/usr/bin/env node

/**
 * regsynth CLI - random string generation from distribution-annotated patterns
 */

import { Command, InvalidArgumentError } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { createParseCommand } from "./commands/parse.js";
import { isLogLevel, LOG_LEVELS, logger, type LogLevel } from "../utils/logger.js";

const pkg = {
  name: "regsynth",
  version: "0.1.0",
  description: "Random string generation from regex-like patterns with distribution annotations",
};

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(", ")}.`);
  }
  return value;
}

/**
 * Main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option(
      "--log-level <level>",
      "Logging verbosity: error, warn, info, debug",
      parseLogLevel,
    )
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (typeof level === "string" && isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  // Add commands
  program.addCommand(createGenerateCommand());
  program.addCommand(createParseCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
