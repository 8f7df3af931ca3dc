import { describe, it, expect } from 'vitest';
import { gzipSync } from 'node:zlib';
import { decodeLines, hasGzipMagic } from '../../../src/infrastructure/lines/decodeLines.js';
import { SourceUnavailableError } from '../../../src/domain/errors/LogReaderError.js';
import { TrackingSource, collect } from '../../fixtures/logs.js';

function chunked(buffer: Buffer, size: number): Buffer[] {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < buffer.length; offset += size) {
    chunks.push(buffer.subarray(offset, offset + size));
  }
  return chunks;
}

describe('decodeLines', () => {
  it('should split plain text into lines', async () => {
    const lines = await collect(decodeLines(new TrackingSource(['a\nb\nc'])));

    expect(lines).toEqual(['a', 'b', 'c']);
  });

  it('should not emit an empty line after a trailing newline', async () => {
    const lines = await collect(decodeLines(new TrackingSource(['a\nb\n'])));

    expect(lines).toEqual(['a', 'b']);
  });

  it('should strip carriage returns from CRLF line endings', async () => {
    const lines = await collect(decodeLines(new TrackingSource(['a\r\nb\r\n'])));

    expect(lines).toEqual(['a', 'b']);
  });

  it('should keep empty lines in the middle of the stream', async () => {
    const lines = await collect(decodeLines(new TrackingSource(['a\n\nb\n'])));

    expect(lines).toEqual(['a', '', 'b']);
  });

  it('should join a line split across chunks', async () => {
    const lines = await collect(decodeLines(new TrackingSource(['#Vers', 'ion: 1.0\n#Fie', 'lds: date\n'])));

    expect(lines).toEqual(['#Version: 1.0', '#Fields: date']);
  });

  it('should decode a multibyte character split across chunks', async () => {
    const source = new TrackingSource([Buffer.from([0x63, 0x61, 0x66, 0xc3]), Buffer.from([0xa9, 0x0a])]);

    const lines = await collect(decodeLines(source));

    expect(lines).toEqual(['café']);
  });

  it('should yield nothing for an empty source', async () => {
    const lines = await collect(decodeLines(new TrackingSource([])));

    expect(lines).toEqual([]);
  });

  it('should inflate gzip input detected by its magic bytes', async () => {
    const source = new TrackingSource([gzipSync('first\nsecond\n')], { fileName: 'test.log' });

    const lines = await collect(decodeLines(source));

    expect(lines).toEqual(['first', 'second']);
  });

  it('should inflate gzip input delivered in small chunks', async () => {
    const source = new TrackingSource(chunked(gzipSync('first\nsecond\nthird'), 3), { fileName: 'test.log' });

    const lines = await collect(decodeLines(source));

    expect(lines).toEqual(['first', 'second', 'third']);
  });

  it('should detect gzip magic bytes split across the first chunks', async () => {
    const compressed = gzipSync('#Version: 1.0\n#Fields: date\n');
    const source = new TrackingSource([compressed.subarray(0, 1), compressed.subarray(1)], { fileName: 'log' });

    const lines = await collect(decodeLines(source));

    expect(lines).toEqual(['#Version: 1.0', '#Fields: date']);
  });

  it('should inflate gzip input delivered one byte at a time', async () => {
    const source = new TrackingSource(chunked(gzipSync('first\nsecond\n'), 1), { fileName: 'log' });

    const lines = await collect(decodeLines(source));

    expect(lines).toEqual(['first', 'second']);
  });

  it('should read a one-byte plain source', async () => {
    const lines = await collect(decodeLines(new TrackingSource(['a'])));

    expect(lines).toEqual(['a']);
  });

  it('should inflate a .gz file in auto mode', async () => {
    const source = new TrackingSource([gzipSync('first\n')], { fileName: 'E2ABC.2024-01-01-13.abcd.gz' });

    const lines = await collect(decodeLines(source, { compression: 'auto' }));

    expect(lines).toEqual(['first']);
  });

  it('should read a .gz name as plain text when compression is none', async () => {
    const source = new TrackingSource(['plain\n'], { fileName: 'renamed.gz' });

    const lines = await collect(decodeLines(source, { compression: 'none' }));

    expect(lines).toEqual(['plain']);
  });

  it('should report corrupt gzip input as SourceUnavailableError', async () => {
    const truncated = gzipSync('first\nsecond\nthird\n').subarray(0, 12);
    const source = new TrackingSource([truncated]);

    const error: unknown = await collect(decodeLines(source)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ locator: 'memory:test.log' });
    expect(String(error)).toContain('SourceUnavailable: memory:test.log: gzip: ');
  });

  it('should report source failures as they happen', async () => {
    const source = new TrackingSource(['a\n', 'b\n'], { failAtChunk: 1 });
    const lines: string[] = [];

    await expect(async () => {
      for await (const line of decodeLines(source)) lines.push(line);
    }).rejects.toThrow('connection reset');
    expect(lines).toEqual(['a']);
  });

  it('should report bytes that are not valid UTF-8', async () => {
    const source = new TrackingSource([Buffer.from([0x61, 0xff, 0x0a])]);

    const error: unknown = await collect(decodeLines(source)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(String(error)).toContain('SourceUnavailable: memory:test.log: invalid utf-8 data: ');
  });

  it('should report a multibyte character cut off at the end of the stream', async () => {
    const source = new TrackingSource([Buffer.from([0x63, 0x61, 0x66, 0xc3])]);

    await expect(collect(decodeLines(source))).rejects.toThrow(SourceUnavailableError);
  });

  it('should decode with the configured encoding', async () => {
    const source = new TrackingSource([Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a])]);

    const lines = await collect(decodeLines(source, { encoding: 'latin1' }));

    expect(lines).toEqual(['café']);
  });
});

describe('hasGzipMagic', () => {
  it('should recognise the gzip header', () => {
    expect(hasGzipMagic(gzipSync('x'))).toBe(true);
  });

  it('should reject plain text and short chunks', () => {
    expect(hasGzipMagic(Buffer.from('#Version: 1.0'))).toBe(false);
    expect(hasGzipMagic(Buffer.from([0x1f]))).toBe(false);
  });
});
