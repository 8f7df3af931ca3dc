import { Readable } from 'node:stream';
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { S3ClientConfig } from '@aws-sdk/client-s3';
import type { ObjectLocation, ObjectStore, StoredObject } from '../../domain/ports/ObjectStore.js';

export interface S3ObjectStoreOptions {
  /** Client to use. Default: a new `S3Client` built from `config`. */
  readonly client?: S3Client;
  /** Forwarded verbatim to `new S3Client()` (region, credentials, profile, endpoint, retries). */
  readonly config?: S3ClientConfig;
}

/**
 * `ObjectStore` adapter for Amazon S3 using AWS SDK v3.
 *
 * Credential resolution, retries and request timeouts are the SDK's; errors it raises
 * (`NoSuchKey`, `AccessDenied`, network failures) propagate unchanged.
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(options?: S3ObjectStoreOptions) {
    this.client = options?.client ?? new S3Client(options?.config ?? {});
  }

  async getObject(location: ObjectLocation): Promise<StoredObject> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: location.bucket, Key: location.key }));
    const body = response.Body;

    if (!(body instanceof Readable)) {
      throw new Error(`S3ObjectStore: s3://${location.bucket}/${location.key} returned no readable body`);
    }

    return {
      body,
      contentLength: response.ContentLength,
      destroy: () => {
        body.destroy();
      },
    };
  }
}
