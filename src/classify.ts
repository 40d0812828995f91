import { compileGlob } from './glob.js';
import type { EncryptionScheme, SchemePatterns } from './types.js';

function freezeSchemes(list: SchemePatterns[]): readonly SchemePatterns[] {
  return Object.freeze(
    list.map(({ scheme, patterns }) => Object.freeze({ scheme, patterns: Object.freeze([...patterns]) }))
  );
}

/**
 * File-name patterns per encryption scheme.
 *
 * Order matters: schemes are tried top to bottom, then their patterns in
 * the listed order, and the first match decides.
 */
export const ENCRYPTION_SCHEME_PATTERNS: readonly SchemePatterns[] = freezeSchemes([
  { scheme: 'ncm', patterns: ['*.ncm'] },
  {
    scheme: 'qmc',
    patterns: [
      '*.qmc[023468]', '*.qmcflac', '*.qmcogg',
      '*.tkm',
      '*.mflac', '*.mflac[0]', '*.mgg', '*.mgg[01l]',
      '*.bkcmp3', '*.bkcm4a', '*.bkcflac', '*.bkcwav', '*.bkcape', '*.bkcogg', '*.bkcwma',
    ],
  },
]);

const COMPILED: readonly { scheme: EncryptionScheme; matchers: readonly RegExp[] }[] =
  ENCRYPTION_SCHEME_PATTERNS.map(({ scheme, patterns }) => ({
    scheme,
    matchers: patterns.map(compileGlob),
  }));

/**
 * Encryption scheme implied by a file name, or undefined for plain files.
 *
 * The whole name must match a pattern, case-sensitively.
 */
export function classifyByName(name: string): EncryptionScheme | undefined {
  for (const { scheme, matchers } of COMPILED) {
    if (matchers.some(re => re.test(name))) {
      return scheme;
    }
  }
  return undefined;
}

/**
 * Last suffix of the final path component, dot included (`'song.qmc3'` → `'.qmc3'`).
 *
 * Leading dots do not start a suffix (`'.bashrc'` → `''`).
 */
export function fileExtension(name: string): string {
  const sepIndex = name.lastIndexOf('/');
  const dotIndex = name.lastIndexOf('.');
  if (dotIndex <= sepIndex) {
    return '';
  }

  for (let i = sepIndex + 1; i < dotIndex; i++) {
    if (name[i] !== '.') {
      return name.slice(dotIndex);
    }
  }
  return '';
}

/**
 * Every scheme name, in match order
 */
export function getSupportedSchemes(): EncryptionScheme[] {
  return ENCRYPTION_SCHEME_PATTERNS.map(s => s.scheme);
}
