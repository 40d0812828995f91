import { describe, it, expect } from 'vitest';
import {
  classifyByName,
  fileExtension,
  getSupportedSchemes,
  ENCRYPTION_SCHEME_PATTERNS,
} from '../../src/classify.js';

describe('classifyByName', () => {
  it('should classify NetEase containers', () => {
    expect(classifyByName('track.ncm')).toBe('ncm');
  });

  it('should classify numbered QMC files', () => {
    expect(classifyByName('song.qmc3')).toBe('qmc');
    expect(classifyByName('song.qmc0')).toBe('qmc');
    expect(classifyByName('song.qmc1')).toBeUndefined();
  });

  it('should classify the remaining QMC variants', () => {
    const names = [
      'a.qmcflac', 'a.qmcogg', 'a.tkm', 'a.mflac', 'a.mflac0', 'a.mgg',
      'a.mgg0', 'a.mgg1', 'a.mggl', 'a.bkcmp3', 'a.bkcm4a', 'a.bkcflac',
      'a.bkcwav', 'a.bkcape', 'a.bkcogg', 'a.bkcwma',
    ];
    for (const name of names) {
      expect(classifyByName(name)).toBe('qmc');
    }
  });

  it('should match *.mflac[0] against a.mflac0 only', () => {
    expect(classifyByName('a.mflac0')).toBe('qmc');
    expect(classifyByName('a.mflac1')).toBeUndefined();
  });

  it('should return undefined for plain audio', () => {
    expect(classifyByName('plain.mp3')).toBeUndefined();
    expect(classifyByName('plain.flac')).toBeUndefined();
  });

  it('should match full paths', () => {
    expect(classifyByName('/music/album/01 intro.mgg1')).toBe('qmc');
  });

  it('should be case-sensitive', () => {
    expect(classifyByName('TRACK.NCM')).toBeUndefined();
  });

  it('should not match a scheme suffix in the middle of a name', () => {
    expect(classifyByName('track.ncm.part')).toBeUndefined();
  });

  it('should return undefined for an empty name', () => {
    expect(classifyByName('')).toBeUndefined();
  });
});

describe('ENCRYPTION_SCHEME_PATTERNS', () => {
  it('should list schemes in match order', () => {
    expect(getSupportedSchemes()).toEqual(['ncm', 'qmc']);
  });

  it('should keep QMC patterns in declaration order', () => {
    const qmc = ENCRYPTION_SCHEME_PATTERNS.find(s => s.scheme === 'qmc');
    expect(qmc?.patterns.slice(0, 4)).toEqual(['*.qmc[023468]', '*.qmcflac', '*.qmcogg', '*.tkm']);
    expect(qmc?.patterns).toHaveLength(15);
  });

  it('should be frozen so it always matches what classifyByName uses', () => {
    expect(Object.isFrozen(ENCRYPTION_SCHEME_PATTERNS)).toBe(true);
    for (const entry of ENCRYPTION_SCHEME_PATTERNS) {
      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(entry.patterns)).toBe(true);
    }
  });
});

describe('fileExtension', () => {
  it('should return the last suffix with its dot', () => {
    expect(fileExtension('song.qmc3')).toBe('.qmc3');
    expect(fileExtension('archive.tar.gz')).toBe('.gz');
  });

  it('should return an empty string when there is no dot', () => {
    expect(fileExtension('README')).toBe('');
  });

  it('should ignore dots in directory names', () => {
    expect(fileExtension('/music.d/track')).toBe('');
    expect(fileExtension('/music.d/track.ncm')).toBe('.ncm');
  });

  it('should not treat leading dots as a suffix', () => {
    expect(fileExtension('.bashrc')).toBe('');
    expect(fileExtension('..')).toBe('');
    expect(fileExtension('dir/.hidden')).toBe('');
  });

  it('should find a suffix after leading dots', () => {
    expect(fileExtension('.config.json')).toBe('.json');
  });

  it('should keep a trailing dot', () => {
    expect(fileExtension('name.')).toBe('.');
  });
});
