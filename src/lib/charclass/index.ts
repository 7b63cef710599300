/**
 * Character class module - shorthand/posix sets and alphabet resolution
 */
export * from "./alphabets.js";
export * from "./resolve.js";
