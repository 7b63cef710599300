/**
 * Emitter module types
 */

export type OutputFormat = "text" | "ndjson" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "ndjson", "json"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
