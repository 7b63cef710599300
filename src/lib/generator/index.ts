/**
 * Generator module - renders patterns into strings
 */
export * from "./types.js";
export * from "./engine.js";
export * from "./stream.js";
