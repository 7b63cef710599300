/**
 * Text writer - Transform stream that writes one generated string per line
 */

import { Transform, TransformCallback } from "stream";

export class TextWriter extends Transform {
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
    this.push(`${String(chunk)}\n`);
    callback();
  }
}

/**
 * Create a line-per-string text writer
 */
export function createTextWriter(): Transform {
  return new TextWriter();
}
