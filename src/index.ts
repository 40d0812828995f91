/**
 * media-sniff - front-end classifier for media decryption tools
 *
 * Tell which encryption scheme a file name implies, which audio codec or
 * image type its leading bytes carry, and whether a stream handle supports
 * the reads, seeks and writes a decoder needs.
 *
 * @packageDocumentation
 */

// Content sniffing
export {
  identifyFormat,
  headerForFormat,
  getRegistry,
  maxHeaderLength,
  getAudioFormat,
  getImageMime,
  getPossibleAudioHeader,
  getPossibleImageHeader,
} from './detect.js';
export { HeaderRegistry } from './registry.js';
export { AUDIO_SIGNATURES, IMAGE_SIGNATURES } from './signatures.js';

// Name classification
export {
  classifyByName,
  fileExtension,
  getSupportedSchemes,
  ENCRYPTION_SCHEME_PATTERNS,
} from './classify.js';
export { matchGlob, compileGlob } from './glob.js';

// Stream handles
export { validateStream, checkStream, isStreamLike, displayName } from './stream/validate.js';
export type { CapabilityCheckResult } from './stream/validate.js';
export { MemoryStream } from './stream/memory-stream.js';
export type { MemoryStreamOptions } from './stream/memory-stream.js';

// Primitives
export { xorBytes } from './binary/xor.js';

// Types
export { SeekOrigin } from './types.js';
export type {
  AudioFormat,
  ImageMime,
  SniffDomain,
  DomainLabels,
  FormatLabel,
  EncryptionScheme,
  HeaderEntry,
  SchemePatterns,
  BinaryStream,
  Capability,
  CapabilityFault,
  ValidateOptions,
  SniffResult,
  ScanEntry,
  ScanReport,
  ScanOptions,
} from './types.js';

// Error classes
export {
  MediaSniffError,
  CapabilityError,
  LengthMismatchError,
  RegistryConflictError,
  UnsupportedOperationError,
} from './errors.js';
