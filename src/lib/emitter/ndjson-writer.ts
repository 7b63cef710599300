/**
 * NDJSON writer - one JSON string literal per line
 *
 * Generated strings may contain newlines or control characters (`\s`,
 * wildcards over a custom alphabet), which plain text output cannot carry.
 */

import { Transform, TransformCallback } from "stream";

export class NDJSONWriter extends Transform {
  constructor() {
    super({
      writableObjectMode: true,
      readableObjectMode: false,
    });
  }

  _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      this.push(`${JSON.stringify(chunk)}\n`);
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

export function createNDJSONWriter(): Transform {
  return new NDJSONWriter();
}
