import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';
import { SourceUnavailableError, errorMessage } from '../../domain/errors/LogReaderError.js';

type ByteChunk = string | Uint8Array;

export interface StreamSourceOptions {
  /** File name for metadata and compression detection. Default: 'stream-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
  /** Locator to report in errors. Default: `stream:<fileName>`. */
  readonly locator?: string;
}

/** Byte source over an already-open `AsyncIterable` or web `ReadableStream` (uploads, pipes, `process.stdin`). */
export class StreamSource implements ByteSource {
  private readonly stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>;
  private readonly meta: SourceMetadata;
  private iterator: AsyncIterator<ByteChunk> | null = null;
  private reader: ReadableStreamDefaultReader<ByteChunk> | null = null;
  private consumed = false;
  private closed = false;
  private reading = false;
  private pendingRelease: Promise<void> | null = null;
  private releaseFailure: SourceUnavailableError | null = null;

  constructor(stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>, options?: StreamSourceOptions) {
    this.stream = stream;
    const fileName = options?.fileName ?? 'stream-input';
    this.meta = {
      locator: options?.locator ?? `stream:${fileName}`,
      fileName,
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<Buffer> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;
    if (this.closed) {
      throw new SourceUnavailableError(this.meta.locator, 'source was closed before reading');
    }

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;
    const iterator = iterable[Symbol.asyncIterator]();
    this.iterator = iterator;

    for (;;) {
      let result: IteratorResult<ByteChunk>;
      this.reading = true;
      try {
        result = await iterator.next();
      } catch (error) {
        throw new SourceUnavailableError(this.meta.locator, errorMessage(error), { cause: error });
      } finally {
        this.reading = false;
      }
      if (this.closed) {
        // Closed while this read was pending: finish the release started by close().
        await this.pendingRelease;
        if (this.releaseFailure) throw this.releaseFailure;
        return;
      }
      if (result.done) break;
      const chunk = result.value;
      yield typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk);
    }
  }

  /**
   * Release the producer. When a read is pending, the release is started but not
   * awaited, since a stalled producer would hold it forever; a failure it raises
   * is thrown from that pending read.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const iterator = this.iterator;
    this.iterator = null;

    if (!this.reading) {
      await iterator?.return?.();
      return;
    }

    const release = this.reader ? this.reader.cancel() : iterator?.return?.();
    this.pendingRelease = Promise.resolve(release).then(
      () => undefined,
      (error: unknown) => {
        this.releaseFailure = new SourceUnavailableError(this.meta.locator, errorMessage(error), { cause: error });
      },
    );
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(
    stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>,
  ): stream is ReadableStream<ByteChunk> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<ByteChunk>): AsyncIterable<ByteChunk> {
    const reader = stream.getReader();
    this.reader = reader;
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }
        yield value;
      }
    } finally {
      this.reader = null;
      // Stopped early: tell the producer nobody is reading any more.
      if (!finished) await reader.cancel();
      reader.releaseLock();
    }
  }
}
