/** Metadata about the byte source (for logging and compression detection). */
export interface SourceMetadata {
  /** The locator the source was opened from (path or `s3://` URI). */
  readonly locator: string;
  readonly fileName: string;
  /** Size in bytes, when the source knows it before reading. */
  readonly fileSize?: number;
}

/**
 * Port for reading raw log bytes from any origin (local file, S3 object, stream).
 *
 * Bytes may still be compressed: decompression and line splitting happen above
 * this port. A source is read at most once and owns exactly one underlying handle.
 */
export interface ByteSource {
  /** Yield raw byte chunks in file order. */
  read(): AsyncIterable<Buffer>;
  /** Release the underlying handle. Safe to call more than once; the handle is released once. */
  close(): Promise<void>;
  metadata(): SourceMetadata;
}
