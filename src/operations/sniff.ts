/**
 * Single-file sniffing for Node.js environments.
 *
 * Classifies a path, file URL or open handle by its name and leading bytes.
 */

import { open } from 'node:fs/promises';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { classifyByName, fileExtension } from '../classify.js';
import { identifyFormat, maxHeaderLength } from '../detect.js';
import { MediaSniffError } from '../errors.js';
import { displayName, isStreamLike, validateStream } from '../stream/validate.js';
import { SeekOrigin } from '../types.js';
import type { BinaryStream, SniffResult } from '../types.js';

export type SniffSource = string | URL | BinaryStream;

export interface SniffOptions {
  /** Name to classify instead of the path / handle name */
  name?: string;
}

async function readHeader(path: string, length: number): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const header = new Uint8Array(length);
    const { bytesRead } = await handle.read(header, 0, length, 0);
    return header.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function readStreamHeader(stream: BinaryStream, length: number): Uint8Array {
  validateStream(stream, { read: true, seek: true });
  stream.seek(0, SeekOrigin.Start);
  return stream.read(length);
}

function toPath(source: string | URL): string {
  return resolve(source instanceof URL ? fileURLToPath(source) : source);
}

/**
 * Classify a file by name and by its leading bytes.
 *
 * Paths are opened, read and closed here. Open handles are validated for
 * read and seek, rewound to the start and read, but never closed; their
 * cursor is left just past the header.
 */
export async function sniffFile(source: SniffSource, options: SniffOptions = {}): Promise<SniffResult> {
  let name: string;
  let header: Uint8Array;

  if (typeof source === 'string' || source instanceof URL) {
    const path = toPath(source);
    name = options.name ?? path;
    header = await readHeader(path, maxHeaderLength());
  } else if (isStreamLike(source)) {
    name = options.name ?? displayName(source);
    header = readStreamHeader(source, maxHeaderLength());
  } else {
    throw new MediaSniffError('expected a path or an open stream, got raw data');
  }

  const result: SniffResult = { name, extension: fileExtension(name) };
  const scheme = classifyByName(name);
  const audioFormat = identifyFormat(header, 'audio');
  const imageMime = identifyFormat(header, 'image');
  if (scheme) result.scheme = scheme;
  if (audioFormat) result.audioFormat = audioFormat;
  if (imageMime) result.imageMime = imageMime;
  return result;
}
