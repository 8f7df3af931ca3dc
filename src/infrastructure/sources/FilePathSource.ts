import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';
import { SourceUnavailableError, errorMessage } from '../../domain/errors/LogReaderError.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
  /** Locator to report in errors and metadata. Default: the file path. */
  readonly locator?: string;
}

/** Byte source that streams a local file through a single read-only file handle. Node.js only. */
export class FilePathSource implements ByteSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;
  private readonly locator: string;
  private handle: FileHandle | null = null;
  private consumed = false;
  private closed = false;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
    this.locator = options?.locator ?? filePath;
  }

  async *read(): AsyncIterable<Buffer> {
    if (this.consumed) {
      throw new Error('FilePathSource: file has already been read. Sources can only be read once.');
    }
    this.consumed = true;
    if (this.closed) {
      throw new SourceUnavailableError(this.locator, 'source was closed before reading');
    }

    let handle: FileHandle;
    try {
      handle = await open(this.filePath, 'r');
    } catch (error) {
      throw new SourceUnavailableError(this.locator, errorMessage(error), { cause: error });
    }
    if (this.closed) {
      await handle.close();
      throw new SourceUnavailableError(this.locator, 'source was closed while opening');
    }
    this.handle = handle;

    const stream = handle.createReadStream({ highWaterMark: this.highWaterMark, autoClose: false });
    try {
      for await (const chunk of stream) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      }
    } catch (error) {
      throw new SourceUnavailableError(this.locator, errorMessage(error), { cause: error });
    } finally {
      stream.destroy();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.close();
  }

  metadata(): SourceMetadata {
    return {
      locator: this.locator,
      fileName: basename(this.filePath),
    };
  }
}
