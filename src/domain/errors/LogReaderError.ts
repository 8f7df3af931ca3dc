/** Machine-readable codes for every failure the reader can raise. */
export type LogReaderErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_HEADER'
  | 'FIELD_COUNT_MISMATCH'
  | 'FIELD_TYPE'
  | 'NO_CURRENT_RECORD'
  | 'UNKNOWN_FIELD'
  | 'SESSION_CLOSED';

/**
 * Base class for reader failures.
 *
 * Data errors (`FIELD_COUNT_MISMATCH`, `FIELD_TYPE`) carry the 1-based line number
 * and the raw line so a caller can report or skip the offending record themselves.
 * API misuse errors (`NO_CURRENT_RECORD`, `UNKNOWN_FIELD`, `SESSION_CLOSED`) never
 * depend on the data being read.
 */
export abstract class LogReaderError extends Error {
  abstract readonly code: LogReaderErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The locator is malformed, missing, denied, or the transfer failed mid-stream. */
export class SourceUnavailableError extends LogReaderError {
  readonly code = 'SOURCE_UNAVAILABLE' as const;

  constructor(
    readonly locator: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`SourceUnavailable: ${locator}: ${detail}`, options);
  }
}

/** The leading `#Version` / `#Fields` lines do not match the expected grammar. */
export class MalformedHeaderError extends LogReaderError {
  readonly code = 'MALFORMED_HEADER' as const;

  constructor(
    detail: string,
    readonly lineNumber: number,
    readonly line: string | null,
  ) {
    super(`MalformedHeader: line ${String(lineNumber)}: ${detail}`);
  }
}

export class FieldCountMismatchError extends LogReaderError {
  readonly code = 'FIELD_COUNT_MISMATCH' as const;

  constructor(
    readonly lineNumber: number,
    readonly line: string,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `FieldCountMismatch: line ${String(lineNumber)}: expected ${String(expected)} fields, got ${String(actual)}`,
    );
  }
}

export class FieldTypeError extends LogReaderError {
  readonly code = 'FIELD_TYPE' as const;

  constructor(
    readonly field: string,
    readonly value: string,
    readonly expectedType: string,
    readonly lineNumber: number,
    readonly line: string,
  ) {
    super(`FieldTypeError: line ${String(lineNumber)}: field '${field}' is not a valid ${expectedType}: '${value}'`);
  }
}

export class NoCurrentRecordError extends LogReaderError {
  readonly code = 'NO_CURRENT_RECORD' as const;

  constructor() {
    super('NoCurrentRecord: call advance() and check that it returned a record first');
  }
}

export class UnknownFieldError extends LogReaderError {
  readonly code = 'UNKNOWN_FIELD' as const;

  constructor(readonly field: string | number) {
    super(`UnknownField: '${String(field)}' is not declared in the log header`);
  }
}

export class SessionClosedError extends LogReaderError {
  readonly code = 'SESSION_CLOSED' as const;

  constructor() {
    super('SessionClosed: the session has been closed');
  }
}

/** Narrow an unknown thrown value to a reader error. */
export function isLogReaderError(error: unknown): error is LogReaderError {
  return error instanceof LogReaderError;
}

/** Message of an unknown thrown value, for wrapping into reader errors and events. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
