import { randomUUID } from 'node:crypto';
import type { ByteSource } from '../domain/ports/ByteSource.js';
import type { LogHeader } from '../domain/model/FieldSchema.js';
import type { LogRecord } from '../domain/model/LogRecord.js';
import type { FieldValue } from '../domain/model/FieldType.js';
import type { CompressionMode } from '../infrastructure/lines/decodeLines.js';
import { SessionState, canTransition } from '../domain/model/SessionState.js';
import { ABSENT_VALUE } from '../domain/model/FieldType.js';
import { findField } from '../domain/model/FieldSchema.js';
import { isKnownVersion } from '../domain/model/CloudFrontFields.js';
import { parseHeader } from '../domain/services/FormatHeader.js';
import { parseRecord } from '../domain/services/RecordParser.js';
import { formatTimestamp } from '../domain/services/TimestampFormatter.js';
import { decodeLines } from '../infrastructure/lines/decodeLines.js';
import {
  LogReaderError,
  NoCurrentRecordError,
  SessionClosedError,
  SourceUnavailableError,
  UnknownFieldError,
  errorMessage,
  isLogReaderError,
} from '../domain/errors/LogReaderError.js';
import { EventBus } from './EventBus.js';

export interface LogSessionOptions {
  /** Default: `'auto'`. */
  readonly compression?: CompressionMode;
  /** Default: `'utf-8'`. */
  readonly encoding?: string;
  /** Bus that receives this session's lifecycle events. Default: a private bus. */
  readonly eventBus?: EventBus;
}

/**
 * One open, forward-only reading context over one log stream.
 *
 * The session owns its byte source: the source is closed exactly once, on
 * exhaustion, on the first error, or on `close()`, whichever comes first.
 * A session is not shareable; only one `advance()` may be in flight.
 *
 * @example
 * ```typescript
 * const session = await reader.open('s3://logs/E2ABC.2024-01-01-13.abcd.gz');
 * try {
 *   while (await session.advance()) {
 *     console.log(session.formatTimestamp('%H:%M:%S'), session.currentField('cs-uri-stem'));
 *   }
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export class LogSession implements AsyncIterable<LogRecord> {
  readonly id: string;
  private readonly source: ByteSource;
  private readonly eventBus: EventBus;
  private readonly compression: CompressionMode;
  private readonly encoding: string;

  private status: SessionState = SessionState.UNOPENED;
  private lines: AsyncGenerator<string> | null = null;
  private parsedHeader: LogHeader | null = null;
  private currentRecord: LogRecord | null = null;
  private failure: LogReaderError | null = null;
  private linesRead = 0;
  private recordsRead = 0;
  private advancing = false;
  private reading = false;
  private released = false;

  constructor(source: ByteSource, options?: LogSessionOptions) {
    this.id = randomUUID();
    this.source = source;
    this.eventBus = options?.eventBus ?? new EventBus();
    this.compression = options?.compression ?? 'auto';
    this.encoding = options?.encoding ?? 'utf-8';
  }

  get state(): SessionState {
    return this.status;
  }

  get locator(): string {
    return this.source.metadata().locator;
  }

  /** Parsed header, or `null` before `open()` completes. */
  get header(): LogHeader | null {
    return this.parsedHeader;
  }

  /** Record the session is positioned on, or `null` before the first advance and after exhaustion. */
  get current(): LogRecord | null {
    return this.currentRecord;
  }

  /** Number of lines consumed so far, header lines included. */
  get lineNumber(): number {
    return this.linesRead;
  }

  /**
   * Read and parse the header. Called once by `LogReader.open()`.
   *
   * @throws SourceUnavailableError | MalformedHeaderError. The source is released before the error propagates.
   */
  async open(): Promise<this> {
    this.transitionTo(SessionState.OPENING);
    let header: LogHeader;
    try {
      this.lines = decodeLines(this.source, { compression: this.compression, encoding: this.encoding });
      const versionLine = await this.nextLine();
      const fieldsLine = await this.nextLine();
      header = parseHeader(versionLine, fieldsLine);
    } catch (error) {
      throw await this.fail(error);
    }
    if (this.status === SessionState.CLOSED) {
      await this.lines?.return(undefined);
      throw new SessionClosedError();
    }

    this.parsedHeader = header;
    this.transitionTo(SessionState.READY);
    this.eventBus.emit({
      type: 'session:opened',
      sessionId: this.id,
      locator: this.locator,
      version: header.version,
      fieldCount: header.schema.length,
      knownVersion: isKnownVersion(header.version),
      timestamp: Date.now(),
    });
    return this;
  }

  /**
   * Move to the next record.
   *
   * @returns The new current record, or `null` once the stream is exhausted. Exhaustion is
   * terminal: later calls keep returning `null` without touching the source.
   * @throws FieldCountMismatchError | FieldTypeError | SourceUnavailableError, after which the
   * session is `ERRORED` and rethrows the same error on every call but `close()`.
   */
  async advance(): Promise<LogRecord | null> {
    this.assertUsable();
    if (this.status === SessionState.EXHAUSTED) return null;
    if (this.advancing) {
      throw new Error('LogSession: advance() is already in progress. A session cannot be shared.');
    }

    const schema = this.requireHeader().schema;
    this.advancing = true;
    try {
      for (;;) {
        const line = await this.nextLine();
        if (this.status === SessionState.CLOSED) {
          await this.lines?.return(undefined);
          throw new SessionClosedError();
        }
        if (line === undefined) {
          await this.exhaust();
          return null;
        }
        if (line.length === 0 || line.startsWith('#')) continue;

        const record = parseRecord(line, schema, this.linesRead);
        this.currentRecord = record;
        this.recordsRead++;
        return record;
      }
    } catch (error) {
      if (error instanceof SessionClosedError) throw error;
      throw await this.fail(error);
    } finally {
      this.advancing = false;
    }
  }

  /**
   * Typed value of a field in the current record.
   *
   * A string is looked up by field name. A number reads the raw token at that column,
   * with `-` returned as `null`, for columns a caller wants positionally.
   *
   * @throws NoCurrentRecordError before the first advance and after exhaustion.
   * @throws UnknownFieldError when the name is not in the header or the column does not exist.
   */
  currentField(field: string | number): FieldValue {
    const record = this.requireCurrent();

    if (typeof field === 'number') {
      const token = Number.isInteger(field) ? record.tokens[field] : undefined;
      if (token === undefined) throw new UnknownFieldError(field);
      return token === ABSENT_VALUE ? null : token;
    }

    const definition = findField(this.requireHeader().schema, field);
    if (!definition) throw new UnknownFieldError(field);
    if (!Object.hasOwn(record.values, definition.name)) return null;
    return record.values[definition.name] ?? null;
  }

  /**
   * Render the current record's request time with a strftime pattern, in UTC.
   *
   * @returns The formatted time, or `null` when the record's `date` or `time` is `-`.
   * @throws NoCurrentRecordError before the first advance and after exhaustion.
   * @throws UnknownFieldError when the header declares no `date` and `time` fields.
   */
  formatTimestamp(pattern: string): string | null {
    const record = this.requireCurrent();
    const schema = this.requireHeader().schema;
    if (!findField(schema, 'date') || !findField(schema, 'time')) {
      throw new UnknownFieldError('timestamp');
    }
    return record.timestamp ? formatTimestamp(record.timestamp, pattern) : null;
  }

  /** Release the source and end the session. Calling it again is a no-op. */
  async close(): Promise<void> {
    if (this.status === SessionState.CLOSED) return;
    const previousState = this.status;
    this.transitionTo(SessionState.CLOSED);
    this.currentRecord = null;
    await this.release();

    this.eventBus.emit({
      type: 'session:closed',
      sessionId: this.id,
      locator: this.locator,
      recordsRead: this.recordsRead,
      previousState,
      timestamp: Date.now(),
    });
  }

  /** Iterate the remaining records. The session is closed when iteration ends, breaks, or throws. */
  async *records(): AsyncGenerator<LogRecord, void, undefined> {
    try {
      for (;;) {
        const record = await this.advance();
        if (!record) return;
        yield record;
      }
    } finally {
      await this.close();
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<LogRecord, void, undefined> {
    return this.records();
  }

  private async nextLine(): Promise<string | undefined> {
    if (!this.lines) return undefined;
    let next: IteratorResult<string>;
    this.reading = true;
    try {
      next = await this.lines.next();
    } finally {
      this.reading = false;
    }
    if (next.done) return undefined;
    this.linesRead++;
    return next.value;
  }

  private async exhaust(): Promise<void> {
    this.currentRecord = null;
    this.transitionTo(SessionState.EXHAUSTED);
    await this.release();
    this.eventBus.emit({
      type: 'session:exhausted',
      sessionId: this.id,
      locator: this.locator,
      recordsRead: this.recordsRead,
      timestamp: Date.now(),
    });
  }

  /** Move to `ERRORED`, release the source, and return the error to throw. */
  private async fail(error: unknown): Promise<LogReaderError> {
    if (this.status === SessionState.CLOSED) return new SessionClosedError();

    const failure = isLogReaderError(error)
      ? error
      : new SourceUnavailableError(this.locator, errorMessage(error), { cause: error });
    this.failure = failure;
    this.currentRecord = null;
    this.transitionTo(SessionState.ERRORED);
    await this.release();

    this.eventBus.emit({
      type: 'session:failed',
      sessionId: this.id,
      locator: this.locator,
      code: failure.code,
      error: failure.message,
      lineNumber: this.linesRead,
      timestamp: Date.now(),
    });
    return failure;
  }

  private async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    const lines = this.lines;
    // A read in flight finishes the line generator itself once it settles.
    if (lines && !this.reading) {
      try {
        await lines.return(undefined);
      } finally {
        await this.source.close();
      }
      return;
    }
    await this.source.close();
  }

  private assertUsable(): void {
    switch (this.status) {
      case SessionState.CLOSED:
        throw new SessionClosedError();
      case SessionState.ERRORED:
        throw this.failure ?? new SessionClosedError();
      case SessionState.UNOPENED:
      case SessionState.OPENING:
        throw new Error('LogSession: session is not open. Use LogReader.open() to create sessions.');
      case SessionState.READY:
      case SessionState.EXHAUSTED:
        return;
    }
  }

  private requireCurrent(): LogRecord {
    this.assertUsable();
    if (!this.currentRecord) throw new NoCurrentRecordError();
    return this.currentRecord;
  }

  private requireHeader(): LogHeader {
    if (!this.parsedHeader) {
      throw new Error('LogSession: header has not been read. Use LogReader.open() to create sessions.');
    }
    return this.parsedHeader;
  }

  private transitionTo(next: SessionState): void {
    if (!canTransition(this.status, next)) {
      throw new Error(`Invalid session state transition: ${this.status} → ${next}`);
    }
    this.status = next;
  }
}
