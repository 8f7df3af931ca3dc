import { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import type { ByteSource } from '../../domain/ports/ByteSource.js';
import { SourceUnavailableError, errorMessage, isLogReaderError } from '../../domain/errors/LogReaderError.js';

/** How to treat the source bytes. `auto` looks at the file name and the gzip magic bytes. */
export type CompressionMode = 'auto' | 'gzip' | 'none';

export interface DecodeLinesOptions {
  /** Default: `'auto'`. */
  readonly compression?: CompressionMode;
  /** Text encoding label for `TextDecoder`. Default: `'utf-8'`. */
  readonly encoding?: string;
}

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;
const GZIP_MAGIC_LENGTH = 2;

/**
 * Turn a byte source into a lazy sequence of text lines, in file order.
 *
 * Gzip input is inflated on the fly. Lines are split on `\n` with a trailing `\r`
 * removed; a final line without a newline is still emitted. At most one read or
 * inflate buffer plus the current line is held in memory.
 *
 * Stream, inflate and decoding failures (bytes invalid for the encoding) surface
 * as `SourceUnavailableError`.
 */
export async function* decodeLines(source: ByteSource, options?: DecodeLinesOptions): AsyncGenerator<string> {
  const { locator, fileName } = source.metadata();
  const encoding = options?.encoding ?? 'utf-8';
  const decoder = new TextDecoder(encoding, { fatal: true });
  const bytes = inflateIfCompressed(source.read(), options?.compression ?? 'auto', fileName, locator);

  const decode = (chunk?: Buffer): string => {
    try {
      return chunk ? decoder.decode(chunk, { stream: true }) : decoder.decode();
    } catch (error) {
      throw new SourceUnavailableError(locator, `invalid ${encoding} data: ${errorMessage(error)}`, { cause: error });
    }
  };

  let pending = '';
  for await (const chunk of bytes) {
    pending += decode(chunk);

    let start = 0;
    let newline = pending.indexOf('\n', start);
    while (newline !== -1) {
      yield stripCarriageReturn(pending.slice(start, newline));
      start = newline + 1;
      newline = pending.indexOf('\n', start);
    }
    pending = pending.slice(start);
  }

  pending += decode();
  if (pending.length > 0) yield stripCarriageReturn(pending);
}

/** Check a chunk for the two-byte gzip header. */
export function hasGzipMagic(chunk: Uint8Array): boolean {
  return chunk.length >= GZIP_MAGIC_LENGTH && chunk[0] === GZIP_MAGIC_0 && chunk[1] === GZIP_MAGIC_1;
}

async function* inflateIfCompressed(
  chunks: AsyncIterable<Buffer>,
  mode: CompressionMode,
  fileName: string,
  locator: string,
): AsyncGenerator<Buffer> {
  const iterator = chunks[Symbol.asyncIterator]();

  // The magic bytes may arrive split across chunks.
  const head: Buffer[] = [];
  let headLength = 0;
  while (headLength < GZIP_MAGIC_LENGTH) {
    const next = await iterator.next();
    if (next.done) break;
    head.push(next.value);
    headLength += next.value.length;
  }
  if (headLength === 0) return;

  const first = Buffer.concat(head);
  const all = prepend(first, iterator);
  const compressed =
    mode === 'gzip' || (mode === 'auto' && (fileName.toLowerCase().endsWith('.gz') || hasGzipMagic(first)));

  if (compressed) {
    yield* gunzip(all, locator);
  } else {
    yield* all;
  }
}

async function* prepend(head: Buffer, rest: AsyncIterator<Buffer>): AsyncGenerator<Buffer> {
  yield head;
  try {
    for (;;) {
      const next = await rest.next();
      if (next.done) return;
      yield next.value;
    }
  } finally {
    await rest.return?.();
  }
}

async function* gunzip(chunks: AsyncIterable<Buffer>, locator: string): AsyncGenerator<Buffer> {
  const input = Readable.from(chunks);
  const inflater = createGunzip();
  input.on('error', (error) => inflater.destroy(error));
  input.pipe(inflater);

  try {
    for await (const chunk of inflater) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  } catch (error) {
    if (isLogReaderError(error)) throw error;
    throw new SourceUnavailableError(locator, `gzip: ${errorMessage(error)}`, { cause: error });
  } finally {
    input.destroy();
    inflater.destroy();
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
