import type { AudioFormat, HeaderEntry, ImageMime } from './types.js';

/**
 * Audio magic bytes, in match order.
 *
 * Each header/label pair appears exactly once; reverse lookups are derived
 * from this list, so edit nothing else when adding a codec.
 */
export const AUDIO_SIGNATURES: readonly HeaderEntry<AudioFormat>[] = [
  { label: 'flac', header: new Uint8Array([0x66, 0x4c, 0x61, 0x43]) }, // fLaC
  { label: 'mp3', header: new Uint8Array([0x49, 0x44, 0x33]) }, // ID3
  { label: 'ogg', header: new Uint8Array([0x4f, 0x67, 0x67, 0x53]) }, // OggS
  { label: 'm4a', header: new Uint8Array([0x66, 0x74, 0x79, 0x70]) }, // ftyp
  {
    // ASF header object GUID
    label: 'wma',
    header: new Uint8Array([
      0x30, 0x26, 0xb2, 0x75, 0x8e, 0x66, 0xcf, 0x11,
      0xa6, 0xd9, 0x00, 0xaa, 0x00, 0x62, 0xce, 0x6c,
    ]),
  },
  { label: 'wav', header: new Uint8Array([0x52, 0x49, 0x46, 0x46]) }, // RIFF
  { label: 'aac', header: new Uint8Array([0xff, 0xf1]) }, // ADTS, MPEG-4, no CRC
  { label: 'dff', header: new Uint8Array([0x46, 0x52, 0x4d, 0x38]) }, // FRM8
  { label: 'ape', header: new Uint8Array([0x4d, 0x41, 0x43, 0x20]) }, // "MAC "
];

/**
 * Image magic bytes, in match order
 */
export const IMAGE_SIGNATURES: readonly HeaderEntry<ImageMime>[] = [
  { label: 'image/png', header: new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]) },
  { label: 'image/jpeg', header: new Uint8Array([0xff, 0xd8, 0xff]) },
  { label: 'image/bmp', header: new Uint8Array([0x42, 0x4d]) }, // BM
];
