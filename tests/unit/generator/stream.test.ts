/**
 * Sample Stream Tests
 * Verifies batching, counts and error propagation of the string stream
 */

import { describe, it, expect } from 'vitest';
import type { Readable } from 'stream';
import { PatternSampleStream, createSampleStream } from '../../../src/lib/generator/stream.js';
import { generateMany } from '../../../src/lib/generator/engine.js';
import { parsePattern } from '../../../src/lib/parser/parser.js';
import { createRandomSource } from '../../../src/utils/seed-manager.js';
import { scriptedRandom } from '../../helpers/scripted-random.js';

async function consumeStream(stream: Readable): Promise<string[]> {
  const values: string[] = [];
  for await (const value of stream) {
    values.push(String(value));
  }
  return values;
}

describe('PatternSampleStream', () => {
  const pattern = parsePattern('[a-z]{3}');

  it('yields exactly the requested count across batches', async () => {
    const stream = new PatternSampleStream(pattern, 250, createRandomSource('stream-seed'), {
      batchSize: 100,
    });
    const values = await consumeStream(stream);
    expect(values).toHaveLength(250);
    expect(stream.generated).toBe(250);
  });

  it('matches generateMany for the same seed', async () => {
    const streamed = await consumeStream(
      createSampleStream(pattern, 20, createRandomSource('same-seed'), { batchSize: 7 }),
    );
    const direct = generateMany(pattern, 20, createRandomSource('same-seed'));
    expect(streamed).toEqual(direct);
  });

  it('ends immediately for a count of 0', async () => {
    const values = await consumeStream(createSampleStream(pattern, 0, scriptedRandom([])));
    expect(values).toEqual([]);
  });

  it('rejects a negative count', () => {
    expect(() => createSampleStream(pattern, -1, scriptedRandom([]))).toThrow(RangeError);
  });

  it('destroys the stream when generation fails', async () => {
    // Exhausting the scripted source makes the third string throw
    const stream = createSampleStream(parsePattern('[ab]'), 3, scriptedRandom([0, 0.5]));
    await expect(consumeStream(stream)).rejects.toThrow('scripted random exhausted');
  });
});
