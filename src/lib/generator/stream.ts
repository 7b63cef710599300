/**
 * Streaming string generation
 */

import { Readable } from "stream";
import type { RandomSource } from "../../types/distribution.js";
import type { Pattern } from "../../types/pattern.js";
import { logger } from "../../utils/logger.js";
import { generate, resolveMaxRepeat } from "./engine.js";
import type { SampleStreamOptions } from "./types.js";

/**
 * Object-mode readable stream that yields generated strings
 */
export class PatternSampleStream extends Readable {
  private readonly pattern: Pattern;
  private readonly random: RandomSource;
  private readonly totalCount: number;
  private readonly batchSize: number;
  private readonly maxRepeat: number;
  private generatedCount = 0;

  constructor(
    pattern: Pattern,
    count: number,
    random: RandomSource,
    options: SampleStreamOptions = {},
  ) {
    super({ objectMode: true });
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer, got ${count}`);
    }
    this.pattern = pattern;
    this.random = random;
    this.totalCount = count;
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.maxRepeat = resolveMaxRepeat(options.maxRepeat);
  }

  get generated(): number {
    return this.generatedCount;
  }

  _read(): void {
    try {
      if (this.generatedCount >= this.totalCount) {
        this.push(null); // End stream
        return;
      }

      const remaining = this.totalCount - this.generatedCount;
      const count = Math.min(this.batchSize, remaining);

      for (let i = 0; i < count; i++) {
        const value = generate(this.pattern, this.random, {
          maxRepeat: this.maxRepeat,
        });
        this.generatedCount++;
        if (!this.push(value)) {
          break;
        }
      }

      if (this.generatedCount % 1000 === 0) {
        logger.debug("Generated strings", { count: this.generatedCount });
      }
    } catch (error) {
      this.destroy(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Create a stream of `count` strings rendered from `pattern`
 */
export function createSampleStream(
  pattern: Pattern,
  count: number,
  random: RandomSource,
  options?: SampleStreamOptions,
): Readable {
  return new PatternSampleStream(pattern, count, random, options);
}
