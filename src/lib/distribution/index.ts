/**
 * Distribution module - validating constructors, sampling and annotation resolution
 */
export * from "./constructors.js";
export * from "./sampler.js";
export * from "./resolver.js";
