import { UnsupportedOperationError } from '../errors.js';
import { SeekOrigin } from '../types.js';
import type { BinaryStream } from '../types.js';

export interface MemoryStreamOptions {
  name?: string;
  /** Reject writes */
  readonly?: boolean;
}

/**
 * In-memory handle with the same surface as `FileStream`.
 *
 * Writes past the end grow the buffer; a gap left by seeking beyond the end
 * reads back as zeros.
 */
export class MemoryStream implements BinaryStream {
  public readonly name: string;
  public readonly readonly: boolean;
  private _data: Uint8Array;
  private _length: number;
  private _position = 0;

  constructor(initial: Uint8Array = new Uint8Array(0), options: MemoryStreamOptions = {}) {
    this._data = initial.slice();
    this._length = initial.length;
    this.name = options.name ?? '<memory>';
    this.readonly = options.readonly ?? false;
  }

  get length(): number {
    return this._length;
  }

  read(size = -1): Uint8Array {
    const remaining = Math.max(0, this._length - this._position);
    const length = size < 0 ? remaining : Math.min(size, remaining);
    const out = this._data.slice(this._position, this._position + length);
    this._position += length;
    return out;
  }

  seek(offset: number, origin: SeekOrigin = SeekOrigin.Start): number {
    let base = 0;
    if (origin === SeekOrigin.Current) base = this._position;
    else if (origin === SeekOrigin.End) base = this._length;

    const target = base + offset;
    if (target < 0) {
      throw new RangeError(`negative seek position ${target}`);
    }
    this._position = target;
    return target;
  }

  tell(): number {
    return this._position;
  }

  write(data: Uint8Array): number {
    if (this.readonly) {
      throw new UnsupportedOperationError('write', 'stream is read-only');
    }
    if (data.length === 0) {
      return 0;
    }

    const end = this._position + data.length;
    if (end > this._data.length) {
      const grown = new Uint8Array(Math.max(end, this._data.length * 2));
      grown.set(this._data.subarray(0, this._length));
      this._data = grown;
    }
    this._data.set(data, this._position);
    this._position = end;
    this._length = Math.max(this._length, end);
    return data.length;
  }

  /**
   * Copy of the current contents
   */
  getBuffer(): Uint8Array {
    return this._data.slice(0, this._length);
  }
}
