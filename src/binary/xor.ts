import { LengthMismatchError } from '../errors.js';

/**
 * XOR two equal-length buffers byte by byte into a new buffer.
 *
 * @throws LengthMismatchError when the lengths differ
 */
export function xorBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length !== b.length) {
    throw new LengthMismatchError(a.length, b.length);
  }

  const result = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) {
    result[i] = (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return result;
}
