import { describe, it, expect, beforeEach } from 'vitest';
import { Readable } from 'node:stream';
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { mockClient } from 'aws-sdk-client-mock';
import { sdkStreamMixin } from '@smithy/util-stream';
import { S3ObjectStore } from '../../../src/infrastructure/stores/S3ObjectStore.js';
import { collect } from '../../fixtures/logs.js';

const s3Mock = mockClient(S3Client);

const TEST_CONFIG = {
  region: 'us-east-1',
  credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
};

function body(content: string) {
  return sdkStreamMixin(Readable.from([Buffer.from(content, 'utf-8')]));
}

describe('S3ObjectStore', () => {
  beforeEach(() => {
    s3Mock.reset();
  });

  it('should stream the object body', async () => {
    s3Mock
      .on(GetObjectCommand, { Bucket: 'test-logs', Key: 'cf/a.log' })
      .resolves({ Body: body('#Version: 1.0\n'), ContentLength: 14 });
    const store = new S3ObjectStore({ config: TEST_CONFIG });

    const object = await store.getObject({ bucket: 'test-logs', key: 'cf/a.log' });
    const chunks = await collect(object.body);

    expect(Buffer.concat(chunks).toString('utf-8')).toBe('#Version: 1.0\n');
    expect(object.contentLength).toBe(14);
  });

  it('should send a GetObject request for the location', async () => {
    s3Mock.on(GetObjectCommand).resolves({ Body: body('') });
    const store = new S3ObjectStore({ client: new S3Client(TEST_CONFIG) });

    await store.getObject({ bucket: 'test-logs', key: 'cf/b.log' });

    const calls = s3Mock.commandCalls(GetObjectCommand);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.args[0].input).toEqual({ Bucket: 'test-logs', Key: 'cf/b.log' });
  });

  it('should let client errors propagate', async () => {
    s3Mock.on(GetObjectCommand).rejects(new Error('Access Denied'));
    const store = new S3ObjectStore({ config: TEST_CONFIG });

    await expect(store.getObject({ bucket: 'test-logs', key: 'cf/c.log' })).rejects.toThrow('Access Denied');
  });

  it('should reject a response without a body', async () => {
    s3Mock.on(GetObjectCommand).resolves({});
    const store = new S3ObjectStore({ config: TEST_CONFIG });

    await expect(store.getObject({ bucket: 'test-logs', key: 'cf/d.log' })).rejects.toThrow(
      'S3ObjectStore: s3://test-logs/cf/d.log returned no readable body',
    );
  });

  it('should destroy the body stream', async () => {
    const stream = body('abc');
    s3Mock.on(GetObjectCommand).resolves({ Body: stream });
    const store = new S3ObjectStore({ config: TEST_CONFIG });

    const object = await store.getObject({ bucket: 'test-logs', key: 'cf/e.log' });
    object.destroy();

    expect(stream.destroyed).toBe(true);
  });
});
