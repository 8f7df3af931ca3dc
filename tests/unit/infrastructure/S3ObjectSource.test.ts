import { describe, it, expect } from 'vitest';
import { S3ObjectSource } from '../../../src/infrastructure/sources/S3ObjectSource.js';
import { SourceUnavailableError } from '../../../src/domain/errors/LogReaderError.js';
import type { ObjectLocation, ObjectStore, StoredObject } from '../../../src/domain/ports/ObjectStore.js';
import { collect } from '../../fixtures/logs.js';

/** In-memory store serving one object body, recording requests and destroys. */
function fakeStore(body: () => AsyncIterable<Uint8Array>, contentLength?: number) {
  const requests: ObjectLocation[] = [];
  let destroyCount = 0;
  const store: ObjectStore = {
    getObject(location: ObjectLocation): Promise<StoredObject> {
      requests.push(location);
      return Promise.resolve({
        body: body(),
        contentLength,
        destroy: () => {
          destroyCount++;
        },
      });
    },
  };
  return { store, requests, destroyCount: () => destroyCount };
}

async function* bytes(...chunks: string[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    await Promise.resolve();
    yield new TextEncoder().encode(chunk);
  }
}

describe('S3ObjectSource', () => {
  const location = { bucket: 'test-logs', key: 'cf/E2ABC.2024-01-01-13.abcd.gz' };

  it('should stream the object body', async () => {
    const { store, requests } = fakeStore(() => bytes('#Version: 1.0\n', '#Fields: date\n'));
    const source = new S3ObjectSource(location, store);

    const chunks = await collect(source.read());

    expect(Buffer.concat(chunks).toString('utf-8')).toBe('#Version: 1.0\n#Fields: date\n');
    expect(requests).toEqual([location]);
  });

  it('should wrap store failures as SourceUnavailableError', async () => {
    const failure = new Error('The specified key does not exist.');
    const store: ObjectStore = {
      getObject: () => Promise.reject(failure),
    };
    const source = new S3ObjectSource(location, store);

    const error: unknown = await collect(source.read()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      code: 'SOURCE_UNAVAILABLE',
      locator: 's3://test-logs/cf/E2ABC.2024-01-01-13.abcd.gz',
      message: 'SourceUnavailable: s3://test-logs/cf/E2ABC.2024-01-01-13.abcd.gz: The specified key does not exist.',
      cause: failure,
    });
  });

  it('should wrap failures while streaming the body', async () => {
    async function* broken(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode('#Version: 1.0\n');
      await Promise.resolve();
      throw new Error('socket hang up');
    }
    const { store } = fakeStore(broken);
    const source = new S3ObjectSource(location, store);

    await expect(collect(source.read())).rejects.toThrow(': socket hang up');
  });

  it('should destroy the transfer once, however often it is closed', async () => {
    const { store, destroyCount } = fakeStore(() => bytes('a', 'b', 'c'));
    const source = new S3ObjectSource(location, store);
    const iterator = source.read()[Symbol.asyncIterator]();
    await iterator.next();

    await source.close();
    await source.close();

    expect(destroyCount()).toBe(1);
  });

  it('should not fetch after close', async () => {
    const { store, requests } = fakeStore(() => bytes('a'));
    const source = new S3ObjectSource(location, store);

    await source.close();

    await expect(collect(source.read())).rejects.toThrow('source was closed before reading');
    expect(requests).toEqual([]);
  });

  it('should describe the object in its metadata', async () => {
    const { store } = fakeStore(() => bytes('abc'), 3);
    const source = new S3ObjectSource(location, store);

    expect(source.metadata()).toEqual({
      locator: 's3://test-logs/cf/E2ABC.2024-01-01-13.abcd.gz',
      fileName: 'E2ABC.2024-01-01-13.abcd.gz',
      fileSize: undefined,
    });

    await collect(source.read());

    expect(source.metadata().fileSize).toBe(3);
  });
});
