import crypto from "crypto";
import { generateMersenne53Randomizer } from "@faker-js/faker";
import type { RandomSource } from "../types/distribution.js";

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // Convert first 8 characters of hash to numeric seed
  const numericSeed = parseInt(hash.slice(0, 8), 16);

  return numericSeed;
}

export function generateRandomSeed(): string {
  // Generate a cryptographically secure random seed
  return crypto.randomBytes(32).toString("hex");
}

/**
 * Resolve a user-facing seed to the integer the randomizer takes.
 * Integers pass through; anything else is hashed.
 */
export function toNumericSeed(seed: string | number): number {
  if (typeof seed === "number" && Number.isSafeInteger(seed)) {
    return seed;
  }
  return hashStringToSeed(String(seed));
}

/**
 * Create a seeded random source backed by faker's Mersenne Twister
 *
 * @example
 * const random = createRandomSource("fixtures-v1");
 * generate(pattern, random);
 */
export function createRandomSource(seed: string | number): RandomSource {
  const randomizer = generateMersenne53Randomizer(toNumericSeed(seed));
  return {
    next: () => randomizer.next(),
  };
}
