import { HeaderRegistry } from './registry.js';
import { AUDIO_SIGNATURES, IMAGE_SIGNATURES } from './signatures.js';
import type { AudioFormat, DomainLabels, FormatLabel, ImageMime, SniffDomain } from './types.js';

const REGISTRIES: { [D in SniffDomain]: HeaderRegistry<DomainLabels[D]> } = {
  audio: new HeaderRegistry(AUDIO_SIGNATURES),
  image: new HeaderRegistry(IMAGE_SIGNATURES),
};

/**
 * Registry backing a domain
 */
export function getRegistry<D extends SniffDomain>(domain: D): HeaderRegistry<FormatLabel<D>> {
  return REGISTRIES[domain];
}

/**
 * Name the content format of `data` from its leading bytes.
 *
 * Entries are tried in declaration order and the first header that prefixes
 * the data wins. Empty or short buffers simply match nothing.
 */
export function identifyFormat<D extends SniffDomain>(
  data: Uint8Array,
  domain: D
): FormatLabel<D> | undefined {
  return getRegistry(domain).identify(data);
}

/**
 * Magic bytes for a label (`'flac'`, `'.flac'`, `'image/png'`)
 */
export function headerForFormat(label: string, domain: SniffDomain): Uint8Array | undefined {
  return getRegistry(domain).headerFor(label);
}

/**
 * Number of leading bytes that is always enough to decide any domain
 */
export function maxHeaderLength(): number {
  return Math.max(REGISTRIES.audio.maxHeaderLength, REGISTRIES.image.maxHeaderLength);
}

export function getAudioFormat(data: Uint8Array): AudioFormat | undefined {
  return identifyFormat(data, 'audio');
}

export function getImageMime(data: Uint8Array): ImageMime | undefined {
  return identifyFormat(data, 'image');
}

export function getPossibleAudioHeader(format: string): Uint8Array | undefined {
  return headerForFormat(format, 'audio');
}

export function getPossibleImageHeader(mime: string): Uint8Array | undefined {
  return headerForFormat(mime, 'image');
}
