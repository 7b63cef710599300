// Core re-exports for the regsynth type system
// Module option types live beside their modules and are exported from there

export * from "./distribution.js";
export * from "./pattern.js";
