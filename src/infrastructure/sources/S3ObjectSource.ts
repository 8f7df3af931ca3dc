import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';
import type { ObjectLocation, ObjectStore, StoredObject } from '../../domain/ports/ObjectStore.js';
import { SourceUnavailableError, errorMessage } from '../../domain/errors/LogReaderError.js';

/**
 * Byte source that streams one object from a remote object store.
 *
 * Every store failure (missing key, access denied, network error, timeout) is
 * surfaced as `SourceUnavailableError` with the store's error as `cause`. No retries
 * happen here: retry policy belongs to the store client.
 */
export class S3ObjectSource implements ByteSource {
  private readonly location: ObjectLocation;
  private readonly store: ObjectStore;
  private object: StoredObject | null = null;
  private contentLength: number | undefined;
  private consumed = false;
  private closed = false;

  constructor(location: ObjectLocation, store: ObjectStore) {
    this.location = location;
    this.store = store;
  }

  async *read(): AsyncIterable<Buffer> {
    if (this.consumed) {
      throw new Error('S3ObjectSource: object has already been read. Sources can only be read once.');
    }
    this.consumed = true;
    if (this.closed) {
      throw new SourceUnavailableError(this.locator(), 'source was closed before reading');
    }

    let object: StoredObject;
    try {
      object = await this.store.getObject(this.location);
    } catch (error) {
      throw new SourceUnavailableError(this.locator(), errorMessage(error), { cause: error });
    }
    if (this.closed) {
      object.destroy();
      throw new SourceUnavailableError(this.locator(), 'source was closed while opening');
    }
    this.object = object;
    this.contentLength = object.contentLength;

    try {
      for await (const chunk of object.body) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      }
    } catch (error) {
      throw new SourceUnavailableError(this.locator(), errorMessage(error), { cause: error });
    }
  }

  close(): Promise<void> {
    this.release();
    return Promise.resolve();
  }

  private release(): void {
    if (this.closed) return;
    this.closed = true;
    const object = this.object;
    this.object = null;
    object?.destroy();
  }

  metadata(): SourceMetadata {
    const segments = this.location.key.split('/');
    return {
      locator: this.locator(),
      fileName: segments[segments.length - 1] ?? this.location.key,
      fileSize: this.contentLength,
    };
  }

  private locator(): string {
    return `s3://${this.location.bucket}/${this.location.key}`;
  }
}
