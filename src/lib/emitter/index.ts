/**
 * Emitter module - output formats for generated strings
 */
import type { Transform } from "stream";
import { createJSONWriter } from "./json-writer.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import { createTextWriter } from "./text-writer.js";
import type { OutputFormat } from "./types.js";

export * from "./types.js";
export * from "./ndjson-writer.js";
export * from "./json-writer.js";
export * from "./text-writer.js";

/**
 * Create the writer transform for an output format
 */
export function createFormatWriter(format: OutputFormat): Transform {
  switch (format) {
    case "json":
      return createJSONWriter();
    case "ndjson":
      return createNDJSONWriter();
    case "text":
      return createTextWriter();
  }
}
