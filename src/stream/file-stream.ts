import { closeSync, fstatSync, openSync, readSync, writeSync } from 'node:fs';
import { UnsupportedOperationError } from '../errors.js';
import { SeekOrigin } from '../types.js';
import type { BinaryStream } from '../types.js';

export type FileMode = 'r' | 'r+' | 'w' | 'w+';

/**
 * Synchronous, cursor-based handle over a file descriptor.
 *
 * `r` read-only, `r+` read/write, `w` write-only (truncates),
 * `w+` read/write (truncates). The handle owns its descriptor.
 */
export class FileStream implements BinaryStream {
  public readonly name: string;
  public readonly mode: FileMode;
  private _fd: number | undefined;
  private _position = 0;

  private constructor(name: string, fd: number, mode: FileMode) {
    this.name = name;
    this._fd = fd;
    this.mode = mode;
  }

  static open(path: string, mode: FileMode = 'r'): FileStream {
    return new FileStream(path, openSync(path, mode), mode);
  }

  get closed(): boolean {
    return this._fd === undefined;
  }

  get readable(): boolean {
    return this.mode !== 'w';
  }

  get writable(): boolean {
    return this.mode !== 'r';
  }

  read(size = -1): Uint8Array {
    const fd = this._descriptor('read');
    if (!this.readable) {
      throw new UnsupportedOperationError('read', 'file not open for reading');
    }

    const remaining = Math.max(0, fstatSync(fd).size - this._position);
    const length = size < 0 ? remaining : Math.min(size, remaining);
    if (length === 0) {
      return new Uint8Array(0);
    }

    const out = new Uint8Array(length);
    const n = readSync(fd, out, 0, length, this._position);
    this._position += n;
    return n === length ? out : out.slice(0, n);
  }

  seek(offset: number, origin: SeekOrigin = SeekOrigin.Start): number {
    const fd = this._descriptor('seek');
    let base = 0;
    if (origin === SeekOrigin.Current) base = this._position;
    else if (origin === SeekOrigin.End) base = fstatSync(fd).size;

    const target = base + offset;
    if (target < 0) {
      throw new RangeError(`negative seek position ${target}`);
    }
    this._position = target;
    return target;
  }

  tell(): number {
    this._descriptor('tell');
    return this._position;
  }

  write(data: Uint8Array): number {
    const fd = this._descriptor('write');
    if (!this.writable) {
      throw new UnsupportedOperationError('write', 'file not open for writing');
    }
    if (data.length === 0) {
      return 0;
    }

    const n = writeSync(fd, data, 0, data.length, this._position);
    this._position += n;
    return n;
  }

  close(): void {
    if (this._fd !== undefined) {
      closeSync(this._fd);
      this._fd = undefined;
    }
  }

  private _descriptor(operation: string): number {
    if (this._fd === undefined) {
      throw new UnsupportedOperationError(operation, 'I/O operation on closed file');
    }
    return this._fd;
  }
}
