/**
 * Streaming application of the Caesar shift
 * Each chunk is shifted and pushed as soon as it is read; nothing is
 * buffered beyond the stream high-water marks.
 */

import { Readable, Transform, Writable, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { shiftBytes } from './shift.js';

export type CipherSource = string | Uint8Array | Readable | AsyncIterable<Uint8Array | string>;

export class ShiftStream extends Transform {
  private readonly shift: number;

  constructor(shift: number) {
    super();
    this.shift = shift;
  }

  override _transform(chunk: Buffer | string, encoding: BufferEncoding, callback: TransformCallback): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, encoding) : chunk;
    callback(null, shiftBytes(this.shift, bytes));
  }
}

function toReadable(source: CipherSource): Readable {
  if (source instanceof Readable) return source;
  if (typeof source === 'string') return Readable.from([Buffer.from(source, 'utf-8')]);
  if (source instanceof Uint8Array) return Readable.from([Buffer.from(source)]);
  return Readable.from(source);
}

/**
 * Shift everything from `source` into `sink`.
 * With `end: false` the sink stays open after the source is drained.
 * Errors from either side reject unchanged.
 */
export async function applyShift(
  shift: number,
  source: CipherSource,
  sink: Writable,
  options: { end?: boolean } = {}
): Promise<void> {
  await pipeline(toReadable(source), new ShiftStream(shift), sink, { end: options.end ?? true });
}

/**
 * Collect the shifted output of a source into a single buffer.
 */
export async function shiftToBuffer(shift: number, source: CipherSource): Promise<Buffer> {
  const chunks: Buffer[] = [];
  const collector = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  await applyShift(shift, source, collector);
  return Buffer.concat(chunks);
}
