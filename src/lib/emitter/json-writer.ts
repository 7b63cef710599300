/**
 * JSON array writer
 *
 * Emits `[`, then each chunk as an indented array element, then `]`.
 * An empty stream still produces a valid (empty) array.
 */

import { Transform, TransformCallback } from "stream";

export class JSONWriter extends Transform {
  private written = 0;

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
      const prefix = this.written === 0 ? "[\n  " : ",\n  ";
      this.push(prefix + JSON.stringify(chunk));
      this.written++;
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    this.push(this.written === 0 ? "[]\n" : "\n]\n");
    callback();
  }
}

export function createJSONWriter(): Transform {
  return new JSONWriter();
}
