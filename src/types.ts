/**
 * Audio codecs recognised from magic bytes
 */
export type AudioFormat =
  | 'flac'
  | 'mp3'
  | 'ogg'
  | 'm4a'
  | 'wma'
  | 'wav'
  | 'aac'
  | 'dff'
  | 'ape';

/**
 * Image types recognised from magic bytes, as MIME strings
 */
export type ImageMime = 'image/png' | 'image/jpeg' | 'image/bmp';

/**
 * Which header registry to consult
 */
export type SniffDomain = 'audio' | 'image';

/**
 * Label vocabulary per domain
 */
export interface DomainLabels {
  audio: AudioFormat;
  image: ImageMime;
}

export type FormatLabel<D extends SniffDomain> = DomainLabels[D];

/**
 * Proprietary container / encryption schemes recognised from file names
 */
export type EncryptionScheme = 'ncm' | 'qmc';

/**
 * One row of a header registry
 */
export interface HeaderEntry<L extends string = string> {
  header: Uint8Array;
  label: L;
}

/**
 * Ordered glob patterns for one scheme
 */
export interface SchemePatterns {
  readonly scheme: EncryptionScheme;
  readonly patterns: readonly string[];
}

// ─── Stream handles ───────────────────────────────────────────────────────────

/**
 * Reference points for `seek`
 */
export const SeekOrigin = {
  Start: 0,
  Current: 1,
  End: 2,
} as const;

export type SeekOrigin = (typeof SeekOrigin)[keyof typeof SeekOrigin];

/**
 * Synchronous binary stream handle handed to decoders.
 *
 * `read` returns at most `size` bytes (everything up to EOF when omitted or
 * negative), `seek` returns the new absolute position.
 */
export interface BinaryStream {
  readonly name?: unknown;
  read(size?: number): Uint8Array;
  seek(offset: number, origin?: SeekOrigin): number;
  tell(): number;
  write(data: Uint8Array): number;
}

export type Capability = 'read' | 'seek' | 'write';

/** `missing`: the handle has no such operation. `faulty`: it has one, but the probe failed. */
export type CapabilityFault = 'missing' | 'faulty';

/**
 * Which probes `validateStream` runs. Order is always read → seek → write.
 */
export interface ValidateOptions {
  /** Probe with a zero-length read (default: true) */
  read?: boolean;
  /** Probe with a seek to end-of-stream (default: true) */
  seek?: boolean;
  /** Probe with a zero-length write (default: false) */
  write?: boolean;
  /**
   * Seek back to the pre-probe position after the seek probe.
   * Off by default: the probe leaves the cursor at end-of-stream.
   * The position comes from `tell()`, or else from `seek(0, Current)`;
   * when neither reports one the seek check fails.
   */
  restorePosition?: boolean;
}

// ─── Node integration ─────────────────────────────────────────────────────────

/**
 * What `sniffFile` learned about one input
 */
export interface SniffResult {
  /** Path, or the handle's display name */
  name: string;
  /** Last suffix including the dot, or '' */
  extension: string;
  /** Encryption scheme implied by the name */
  scheme?: EncryptionScheme;
  /** Audio codec implied by the leading bytes */
  audioFormat?: AudioFormat;
  /** Image type implied by the leading bytes */
  imageMime?: ImageMime;
}

/**
 * One file inside a `ScanReport`
 */
export interface ScanEntry extends Partial<SniffResult> {
  /** Absolute path */
  file: string;
  success: boolean;
  /** Error message when `success` is false */
  error?: string;
}

/**
 * Aggregate produced by `scanDir`
 */
export interface ScanReport {
  /** ISO 8601 timestamp of when the scan started */
  timestamp: string;
  totalFiles: number;
  /** Files with a scheme or a content format */
  recognized: number;
  /** Files read successfully with nothing recognised */
  unrecognized: number;
  failed: number;
  entries: ScanEntry[];
}

export interface ScanOptions {
  /** Recurse into sub-directories (default: true) */
  recursive?: boolean;
  /** Only base names matching one of these globs */
  include?: string[];
  /** Skip base names matching any of these globs */
  exclude?: string[];
  /** Only files whose name implies an encryption scheme */
  encryptedOnly?: boolean;
  /** Max files read in parallel (default: 4; non-finite values fall back to it) */
  concurrency?: number;
}
