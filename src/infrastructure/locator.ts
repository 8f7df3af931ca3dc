import { fileURLToPath } from 'node:url';
import type { ObjectLocation } from '../domain/ports/ObjectStore.js';
import { SourceUnavailableError, errorMessage } from '../domain/errors/LogReaderError.js';

/** Where a log lives: a local path or an object in S3. */
export type SourceLocator =
  | { readonly kind: 'local'; readonly path: string }
  | ({ readonly kind: 's3' } & ObjectLocation);

/**
 * Classify a locator string.
 *
 * - `s3://bucket/path/to/key.gz` → S3 object (bucket and key are both required)
 * - `file:///var/log/cf.gz` → local path
 * - anything else → local path, used as given
 *
 * @throws SourceUnavailableError for an `s3://` URI without a bucket or a key.
 */
export function parseLocator(locator: string): SourceLocator {
  if (locator.startsWith('s3://')) {
    const rest = locator.slice('s3://'.length);
    const slash = rest.indexOf('/');
    const bucket = slash === -1 ? rest : rest.slice(0, slash);
    const key = slash === -1 ? '' : rest.slice(slash + 1);
    if (bucket.length === 0 || key.length === 0) {
      throw new SourceUnavailableError(locator, 'invalid S3 locator, expected s3://<bucket>/<key>');
    }
    return { kind: 's3', bucket, key };
  }

  if (locator.startsWith('file://')) {
    try {
      return { kind: 'local', path: fileURLToPath(locator) };
    } catch (error) {
      throw new SourceUnavailableError(locator, errorMessage(error), { cause: error });
    }
  }

  if (locator.length === 0) {
    throw new SourceUnavailableError(locator, 'empty locator');
  }

  return { kind: 'local', path: locator };
}
