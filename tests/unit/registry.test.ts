import { describe, it, expect } from 'vitest';
import { HeaderRegistry } from '../../src/registry.js';
import { RegistryConflictError } from '../../src/errors.js';
import { fromAscii } from '../../src/binary/buffer.js';

describe('HeaderRegistry', () => {
  it('should resolve overlapping headers by declaration order', () => {
    const registry = new HeaderRegistry([
      { header: fromAscii('AB'), label: 'short' },
      { header: fromAscii('ABC'), label: 'long' },
    ]);

    expect(registry.identify(fromAscii('ABCD'))).toBe('short');
  });

  it('should let a longer header win when declared first', () => {
    const registry = new HeaderRegistry([
      { header: fromAscii('ABC'), label: 'long' },
      { header: fromAscii('AB'), label: 'short' },
    ]);

    expect(registry.identify(fromAscii('ABCD'))).toBe('long');
    expect(registry.identify(fromAscii('ABXX'))).toBe('short');
  });

  it('should reject a repeated header', () => {
    expect(
      () =>
        new HeaderRegistry([
          { header: fromAscii('RIFF'), label: 'wav' },
          { header: fromAscii('RIFF'), label: 'avi' },
        ])
    ).toThrow(RegistryConflictError);
  });

  it('should reject a repeated label', () => {
    expect(
      () =>
        new HeaderRegistry([
          { header: fromAscii('ID3'), label: 'mp3' },
          { header: new Uint8Array([0xff, 0xfb]), label: 'mp3' },
        ])
    ).toThrow('Duplicate label in header registry: mp3');
  });

  it('should name a repeated header in hex', () => {
    expect(
      () =>
        new HeaderRegistry([
          { header: new Uint8Array([0xff, 0xd8]), label: 'a' },
          { header: new Uint8Array([0xff, 0xd8]), label: 'b' },
        ])
    ).toThrow('Duplicate header in header registry: ff d8');
  });

  it('should not be affected by later changes to the input entries', () => {
    const header = fromAscii('OggS');
    const registry = new HeaderRegistry([{ header, label: 'ogg' }]);
    header.fill(0);

    expect(registry.identify(fromAscii('OggS'))).toBe('ogg');
  });

  it('should list labels in declaration order', () => {
    const registry = new HeaderRegistry([
      { header: fromAscii('B'), label: 'b' },
      { header: fromAscii('A'), label: 'a' },
    ]);

    expect(registry.labels).toEqual(['b', 'a']);
    expect(registry.entries.map(e => e.label)).toEqual(['b', 'a']);
  });

  it('should report the longest header length', () => {
    const registry = new HeaderRegistry([
      { header: fromAscii('AB'), label: 'x' },
      { header: fromAscii('CDEF'), label: 'y' },
    ]);

    expect(registry.maxHeaderLength).toBe(4);
  });

  it('should narrow strings with has()', () => {
    const registry = new HeaderRegistry([{ header: fromAscii('fLaC'), label: 'flac' }]);

    expect(registry.has('flac')).toBe(true);
    expect(registry.has('.flac')).toBe(false);
  });

  it('should keep both directions consistent', () => {
    const registry = new HeaderRegistry([
      { header: fromAscii('fLaC'), label: 'flac' },
      { header: fromAscii('OggS'), label: 'ogg' },
    ]);

    for (const { header, label } of registry.entries) {
      expect(registry.identify(registry.headerFor(label) ?? new Uint8Array(0))).toBe(label);
      expect(registry.headerFor(label)).toEqual(header);
    }
  });
});
