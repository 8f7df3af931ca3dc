import { describe, it, expect } from 'vitest';
import { parseLocator } from '../../../src/infrastructure/locator.js';
import { SourceUnavailableError } from '../../../src/domain/errors/LogReaderError.js';

describe('parseLocator', () => {
  it('should parse an s3 URI into bucket and key', () => {
    expect(parseLocator('s3://test-logs/cf/2024/E2ABC.2024-01-01-13.abcd.gz')).toEqual({
      kind: 's3',
      bucket: 'test-logs',
      key: 'cf/2024/E2ABC.2024-01-01-13.abcd.gz',
    });
  });

  it.each(['s3://', 's3://test-logs', 's3://test-logs/', 's3:///key.gz'])(
    'should reject the incomplete s3 URI %s',
    (locator) => {
      expect(() => parseLocator(locator)).toThrow(
        `SourceUnavailable: ${locator}: invalid S3 locator, expected s3://<bucket>/<key>`,
      );
    },
  );

  it('should treat a plain path as local', () => {
    expect(parseLocator('/var/log/cf/access.log')).toEqual({ kind: 'local', path: '/var/log/cf/access.log' });
    expect(parseLocator('logs/access.log')).toEqual({ kind: 'local', path: 'logs/access.log' });
  });

  it('should convert a file URL to a local path', () => {
    expect(parseLocator('file:///var/log/cf/access%20log.gz')).toEqual({
      kind: 'local',
      path: '/var/log/cf/access log.gz',
    });
  });

  it('should reject a file URL that names a remote host', () => {
    expect(() => parseLocator('file://remote-host/access.log')).toThrow(SourceUnavailableError);
  });

  it('should reject an empty locator', () => {
    expect(() => parseLocator('')).toThrow('SourceUnavailable: : empty locator');
  });
});
