import type { S3ClientConfig } from '@aws-sdk/client-s3';
import type { ByteSource } from './domain/ports/ByteSource.js';
import type { ObjectStore } from './domain/ports/ObjectStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { CompressionMode } from './infrastructure/lines/decodeLines.js';
import type { Logger } from './infrastructure/logging/logger.js';
import type { LevelWithSilent } from 'pino';
import { EventBus } from './application/EventBus.js';
import { LogSession } from './application/LogSession.js';
import { parseLocator } from './infrastructure/locator.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';
import { S3ObjectSource } from './infrastructure/sources/S3ObjectSource.js';
import { S3ObjectStore } from './infrastructure/stores/S3ObjectStore.js';
import { attachLogger, createLogger } from './infrastructure/logging/logger.js';

/** Configuration for a log reader. Every field is optional. */
export interface LogReaderConfig {
  /** How to detect compression. Default: `'auto'` (`.gz` suffix or gzip magic bytes). */
  readonly compression?: CompressionMode;
  /** Text encoding of the log lines. Default: `'utf-8'`. */
  readonly encoding?: string;
  /** Chunk size in bytes for local file reads. Default: `65536`. */
  readonly highWaterMark?: number;
  /**
   * Client configuration for the default S3 store (region, credentials, profile, endpoint).
   * Passed through to `S3Client` unread.
   */
  readonly s3?: S3ClientConfig;
  /** Object store used for `s3://` locators. Default: an `S3ObjectStore` built from `s3`. */
  readonly objectStore?: ObjectStore;
  /** Logger for session events. Default: a pino logger at `logLevel`. */
  readonly logger?: Logger;
  /** Level for the default logger. Default: `LOG_LEVEL` from the environment, else `'silent'`. */
  readonly logLevel?: LevelWithSilent;
}

/**
 * Entry point for reading CloudFront access logs from local disk or S3.
 *
 * Each `open()` returns an independent `LogSession`; sessions share nothing but the
 * reader's configuration and event subscriptions.
 *
 * @example
 * ```typescript
 * const reader = new LogReader({ s3: { region: 'us-east-1' } });
 * for await (const record of await reader.open('s3://my-logs/E2ABC.2024-01-01-13.abcd.gz')) {
 *   console.log(record.timestamp, record.values['sc-status']);
 * }
 * ```
 */
export class LogReader {
  private readonly config: LogReaderConfig;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private objectStore: ObjectStore | null;

  constructor(config: LogReaderConfig = {}) {
    this.config = config;
    this.logger = config.logger ?? createLogger({ level: config.logLevel });
    this.eventBus = new EventBus((error, event) => {
      this.logger.warn({ err: error, event: event.type }, 'log session event handler threw');
    });
    this.objectStore = config.objectStore ?? null;
    attachLogger(this.eventBus, this.logger);
  }

  /**
   * Open a log for reading and parse its header.
   *
   * @param locator - A local path, a `file://` URL, or an `s3://bucket/key` URI.
   * @throws SourceUnavailableError when the locator is invalid or the log cannot be read.
   * @throws MalformedHeaderError when the first two lines are not a valid header.
   */
  async open(locator: string): Promise<LogSession> {
    return this.openSource(this.createSource(locator));
  }

  /** Open a session over a caller-supplied byte source (e.g. a `StreamSource`). */
  async openSource(source: ByteSource): Promise<LogSession> {
    const session = new LogSession(source, {
      compression: this.config.compression,
      encoding: this.config.encoding,
      eventBus: this.eventBus,
    });
    return session.open();
  }

  /**
   * Run `fn` with an open session and close the session afterwards, whether `fn`
   * returns, throws, or the session fails.
   */
  async withSession<T>(locator: string, fn: (session: LogSession) => Promise<T>): Promise<T> {
    const session = await this.open(locator);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  /** Subscribe to a session event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private createSource(locator: string): ByteSource {
    const parsed = parseLocator(locator);
    switch (parsed.kind) {
      case 'local':
        return new FilePathSource(parsed.path, { highWaterMark: this.config.highWaterMark, locator });
      case 's3':
        return new S3ObjectSource({ bucket: parsed.bucket, key: parsed.key }, this.getObjectStore());
    }
  }

  private getObjectStore(): ObjectStore {
    if (!this.objectStore) {
      this.objectStore = new S3ObjectStore({ config: this.config.s3 });
    }
    return this.objectStore;
  }
}
