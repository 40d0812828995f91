/**
 * Node.js Transform stream that sniffs the content format of piped bytes.
 *
 * Every chunk passes through untouched. Only the leading bytes needed to
 * decide are kept, and a single `format` event fires as soon as they are
 * in (or at end of input for shorter streams).
 *
 * Import from `media-sniff/stream`:
 * ```ts
 * import { createSniffStream } from 'media-sniff/stream';
 * import { createReadStream, createWriteStream } from 'node:fs';
 *
 * const sniffer = createSniffStream('audio');
 * sniffer.once('format', format => console.log(format ?? 'unknown'));
 * createReadStream('track.bin').pipe(sniffer).pipe(createWriteStream('track.copy'));
 * ```
 */

import { Transform, type TransformOptions } from 'node:stream';
import { concat } from './binary/buffer.js';
import { getRegistry } from './detect.js';
import type { FormatLabel, SniffDomain } from './types.js';

export class SniffTransform<D extends SniffDomain> extends Transform {
  public readonly domain: D;
  private readonly _needed: number;
  private _head: Uint8Array = new Uint8Array(0);
  private _decided = false;
  private _format: FormatLabel<D> | undefined;

  constructor(domain: D, streamOptions?: TransformOptions) {
    super(streamOptions);
    this.domain = domain;
    this._needed = getRegistry(domain).maxHeaderLength;
  }

  /** Detected format; undefined until decided or when nothing matched */
  get format(): FormatLabel<D> | undefined {
    return this._format;
  }

  get decided(): boolean {
    return this._decided;
  }

  override _transform(
    chunk: Buffer | Uint8Array | string,
    encoding: BufferEncoding,
    callback: (err?: Error | null) => void
  ): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, encoding) : chunk;

    if (!this._decided) {
      const missing = this._needed - this._head.length;
      this._head = concat(this._head, bytes.subarray(0, missing));
      if (this._head.length >= this._needed) {
        this._decide();
      }
    }

    this.push(bytes);
    callback();
  }

  override _flush(callback: (err?: Error | null) => void): void {
    if (!this._decided) {
      this._decide();
    }
    callback();
  }

  private _decide(): void {
    this._decided = true;
    this._format = getRegistry(this.domain).identify(this._head);
    this._head = new Uint8Array(0);
    this.emit('format', this._format);
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Create a pass-through stream that reports the content format of its input.
 *
 * @param domain  Which registry to match against.
 */
export function createSniffStream<D extends SniffDomain>(
  domain: D,
  streamOptions?: TransformOptions
): SniffTransform<D> {
  return new SniffTransform(domain, streamOptions);
}
