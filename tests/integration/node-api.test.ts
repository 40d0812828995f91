import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { sniffFile, scanFiles, FileStream } from '../../src/node.js';
import { sniffFile as sniffFileDirect } from '../../src/operations/sniff.js';
import { scanFiles as scanFilesDirect } from '../../src/operations/scan.js';
import { MemoryStream } from '../../src/stream/memory-stream.js';
import { CapabilityError } from '../../src/errors.js';
import { fromAscii } from '../../src/binary/buffer.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'media-sniff-node-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

function writeFixture(name: string, data: Uint8Array): string {
  const path = join(tmpDir, name);
  writeFileSync(path, data);
  return path;
}

describe('sniffFile', () => {
  it('should classify a path by name and by content', async () => {
    const path = writeFixture('song.qmc3', fromAscii('fLaC\x00\x00\x00\x22 rest of stream'));

    const result = await sniffFile(path);

    expect(result).toEqual({
      name: path,
      extension: '.qmc3',
      scheme: 'qmc',
      audioFormat: 'flac',
    });
  });

  it('should report only what it recognises', async () => {
    const path = writeFixture('notes.txt', fromAscii('just some text'));

    expect(await sniffFile(path)).toEqual({ name: path, extension: '.txt' });
  });

  it('should detect images', async () => {
    const path = writeFixture('cover', new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]));

    const result = await sniffFile(path);

    expect(result.imageMime).toBe('image/jpeg');
    expect(result.audioFormat).toBeUndefined();
    expect(result.extension).toBe('');
  });

  it('should handle empty files', async () => {
    const path = writeFixture('empty.ncm', new Uint8Array(0));

    expect(await sniffFile(path)).toEqual({ name: path, extension: '.ncm', scheme: 'ncm' });
  });

  it('should accept file URLs', async () => {
    const path = writeFixture('track.ncm', fromAscii('OggS'));

    const result = await sniffFile(pathToFileURL(path));

    expect(result.name).toBe(path);
    expect(result.audioFormat).toBe('ogg');
  });

  it('should let the caller override the classified name', async () => {
    const path = writeFixture('download.tmp', fromAscii('ID3\x03'));

    const result = await sniffFile(path, { name: 'song.mflac0' });

    expect(result).toEqual({
      name: 'song.mflac0',
      extension: '.mflac0',
      scheme: 'qmc',
      audioFormat: 'mp3',
    });
  });

  it('should reject a missing file', async () => {
    await expect(sniffFile(join(tmpDir, 'nope.ncm'))).rejects.toThrow();
  });

  it('should sniff an open handle from its start without closing it', async () => {
    const stream = new MemoryStream(fromAscii('RIFF\x24\x00\x00\x00WAVEfmt '), { name: 'take.bkcwav' });
    stream.seek(6);

    const result = await sniffFile(stream);

    expect(result).toEqual({
      name: 'take.bkcwav',
      extension: '.bkcwav',
      scheme: 'qmc',
      audioFormat: 'wav',
    });
    expect(stream.tell()).toBe(16);
  });

  it('should sniff a FileStream', async () => {
    const path = writeFixture('cover.bmp', fromAscii('BM\x00\x00'));
    const stream = FileStream.open(path);
    try {
      const result = await sniffFile(stream);
      expect(result.imageMime).toBe('image/bmp');
      expect(stream.closed).toBe(false);
    } finally {
      stream.close();
    }
  });

  it('should validate handles before reading', async () => {
    const handle = {
      name: 'pipe',
      read: () => new Uint8Array(0),
      seek: (): number => {
        throw new Error('Illegal seek');
      },
      tell: () => 0,
      write: (data: Uint8Array) => data.length,
    };

    await expect(sniffFile(handle)).rejects.toThrow('cannot seek in stream pipe: Illegal seek');
    await expect(sniffFile(handle)).rejects.toBeInstanceOf(CapabilityError);
  });
});

describe('node entry point', () => {
  it('should re-export the operations modules', () => {
    expect(sniffFile).toBe(sniffFileDirect);
    expect(scanFiles).toBe(scanFilesDirect);
  });

  it('should scan through the standalone sniffing module', async () => {
    const path = writeFixture('clip.mgg', fromAscii('OggS'));

    const report = await scanFilesDirect([path]);

    expect(report.entries[0]).toEqual({
      file: path,
      success: true,
      ...(await sniffFileDirect(path)),
    });
  });
});
