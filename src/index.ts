/**
 * regsynth: random string generation from regex-like patterns whose
 * repeats and character choices follow declared distributions
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/charclass/index.js";
export * from "./lib/distribution/index.js";
export * from "./lib/parser/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/formatter/index.js";
export * from "./lib/emitter/index.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/seed-manager.js";
