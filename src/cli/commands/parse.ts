import { Command } from "commander";
import { formatPattern } from "../../lib/formatter/index.js";
import { parsePattern } from "../../lib/parser/parser.js";
import type { Pattern } from "../../types/pattern.js";
import { RegsynthError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * JSON has no Infinity; unbounded repeats print as "unbounded"
 */
function replaceUnbounded(_key: string, value: unknown): unknown {
  return value === Infinity ? "unbounded" : value;
}

export function describePattern(pattern: Pattern) {
  return {
    status: "success",
    pattern: formatPattern(pattern),
    anchoredStart: pattern.anchoredStart,
    anchoredEnd: pattern.anchoredEnd,
    ast: pattern.root,
  };
}

export function renderPatternReport(pattern: Pattern): string {
  return JSON.stringify(describePattern(pattern), replaceUnbounded, 2);
}

/**
 * Create parse command: validates a pattern and prints its tree
 */
export function createParseCommand(): Command {
  return new Command("parse")
    .description("Validate a pattern and print its canonical form and syntax tree")
    .argument("<pattern>", "Pattern to parse")
    .option("--alphabet <chars>", "Characters '.' and negated classes draw from")
    .action((text: string, opts: { alphabet?: string }) => {
      try {
        const pattern = parsePattern(text, { alphabet: opts.alphabet });
        console.log(renderPatternReport(pattern));
      } catch (error) {
        if (error instanceof RegsynthError) {
          console.error(JSON.stringify(error.toResponse("parse"), null, 2));
        } else {
          logger.error("Parse command error", {
            error: error instanceof Error ? error.message : String(error),
          });
        }
        process.exitCode = 1;
      }
    });
}
