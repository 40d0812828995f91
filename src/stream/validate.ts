import { CapabilityError } from '../errors.js';
import { SeekOrigin } from '../types.js';
import type { Capability, ValidateOptions } from '../types.js';

type Operation = (this: unknown, ...args: unknown[]) => unknown;

export type CapabilityCheckResult = { ok: true } | { ok: false; error: CapabilityError };

const EMPTY = new Uint8Array(0);

function isOperation(value: unknown): value is Operation {
  return typeof value === 'function';
}

function getProperty(value: unknown, key: string): unknown {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return undefined;
  }
  return key in value ? Reflect.get(value, key) : undefined;
}

function getOperation(stream: unknown, key: string): Operation | undefined {
  const op = getProperty(stream, key);
  return isOperation(op) ? op : undefined;
}

/**
 * Identifying name of a stream handle, for messages and reports.
 *
 * String names are returned as is, byte names decoded as UTF-8, any other
 * present value stringified; '' when the handle has no `name`.
 */
export function displayName(stream: unknown): string {
  const name = getProperty(stream, 'name');
  if (name === undefined) {
    return '';
  }
  if (typeof name === 'string') {
    return name;
  }
  if (name instanceof Uint8Array) {
    return new TextDecoder().decode(name);
  }
  return String(name);
}

/**
 * False for paths and raw data (strings, byte buffers, URLs, objects with
 * `toPath()`), true for anything that may be an already-open handle.
 *
 * This only tells callers whether to open something; `validateStream`
 * decides whether the handle is usable.
 */
export function isStreamLike(value: unknown): boolean {
  if (typeof value === 'string') {
    return false;
  }
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
    return false;
  }
  if (value instanceof URL) {
    return false;
  }
  return getOperation(value, 'toPath') === undefined;
}

function fault(capability: Capability, stream: unknown, err: unknown): CapabilityError {
  return new CapabilityError(capability, 'faulty', displayName(stream), {
    cause: err,
    ...(err instanceof Error && { detail: err.message }),
  });
}

function probeRead(stream: unknown): CapabilityError | undefined {
  const read = getOperation(stream, 'read');
  if (!read) {
    return new CapabilityError('read', 'missing', displayName(stream));
  }

  let data: unknown;
  try {
    data = read.call(stream, 0);
  } catch (err) {
    return fault('read', stream, err);
  }
  if (!(data instanceof Uint8Array)) {
    return new CapabilityError('read', 'faulty', displayName(stream), {
      detail: 'not opened in binary mode',
    });
  }
  return undefined;
}

function asPosition(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Cursor position from `tell()`, or from what `seek(0, Current)` returns
 */
function currentPosition(stream: unknown, seek: Operation): number | undefined {
  const tell = getOperation(stream, 'tell');
  return (
    (tell ? asPosition(tell.call(stream)) : undefined) ??
    asPosition(seek.call(stream, 0, SeekOrigin.Current))
  );
}

function probeSeek(stream: unknown, restorePosition: boolean): CapabilityError | undefined {
  const seek = getOperation(stream, 'seek');
  if (!seek) {
    return new CapabilityError('seek', 'missing', displayName(stream));
  }

  try {
    const before = restorePosition ? currentPosition(stream, seek) : undefined;
    if (restorePosition && before === undefined) {
      return new CapabilityError('seek', 'faulty', displayName(stream), {
        detail: 'cannot determine the current position',
      });
    }
    seek.call(stream, 0, SeekOrigin.End);
    if (before !== undefined) {
      seek.call(stream, before, SeekOrigin.Start);
    }
  } catch (err) {
    return fault('seek', stream, err);
  }
  return undefined;
}

function probeWrite(stream: unknown): CapabilityError | undefined {
  const write = getOperation(stream, 'write');
  if (!write) {
    return new CapabilityError('write', 'missing', displayName(stream));
  }

  try {
    write.call(stream, EMPTY);
  } catch (err) {
    return fault('write', stream, err);
  }
  return undefined;
}

/**
 * Probe a stream handle and report the first capability it lacks.
 *
 * Runs the enabled probes in order read → seek → write and stops at the
 * first failure. The seek probe moves the cursor to end-of-stream and
 * leaves it there unless `restorePosition` is set.
 */
export function checkStream(stream: unknown, options: ValidateOptions = {}): CapabilityCheckResult {
  const { read = true, seek = true, write = false, restorePosition = false } = options;

  const error =
    (read ? probeRead(stream) : undefined) ??
    (seek ? probeSeek(stream, restorePosition) : undefined) ??
    (write ? probeWrite(stream) : undefined);

  return error ? { ok: false, error } : { ok: true };
}

/**
 * Like `checkStream`, but throws the `CapabilityError`
 */
export function validateStream(stream: unknown, options: ValidateOptions = {}): void {
  const result = checkStream(stream, options);
  if (!result.ok) {
    throw result.error;
  }
}
