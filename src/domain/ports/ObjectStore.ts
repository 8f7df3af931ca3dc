/** Address of one object in a bucket-style store. */
export interface ObjectLocation {
  readonly bucket: string;
  readonly key: string;
}

/** An object whose body is being streamed from the store. */
export interface StoredObject {
  readonly body: AsyncIterable<Uint8Array>;
  readonly contentLength?: number;
  /** Abort the transfer and free the connection. */
  destroy(): void;
}

/**
 * Port for the remote object store.
 *
 * Implementations handle credentials, transport and retries themselves and reject
 * with whatever error their client raises; callers wrap those failures.
 */
export interface ObjectStore {
  getObject(location: ObjectLocation): Promise<StoredObject>;
}
