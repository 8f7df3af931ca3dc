import type { LogFormatVersion } from '../model/FieldSchema.js';
import type { SessionState } from '../model/SessionState.js';
import type { LogReaderErrorCode } from '../errors/LogReaderError.js';

/** Emitted once the header has been parsed and the session can be advanced. */
export interface SessionOpenedEvent {
  readonly type: 'session:opened';
  readonly sessionId: string;
  readonly locator: string;
  readonly version: LogFormatVersion;
  readonly fieldCount: number;
  /** `false` when the version is not in the type table and was read against the newest one. */
  readonly knownVersion: boolean;
  readonly timestamp: number;
}

/** Emitted when the last record has been read and the source released. */
export interface SessionExhaustedEvent {
  readonly type: 'session:exhausted';
  readonly sessionId: string;
  readonly locator: string;
  readonly recordsRead: number;
  readonly timestamp: number;
}

/** Emitted when opening or reading fails. The session is unusable afterwards. */
export interface SessionFailedEvent {
  readonly type: 'session:failed';
  readonly sessionId: string;
  readonly locator: string;
  /** Reader error code, or `undefined` for an error raised outside the reader. */
  readonly code: LogReaderErrorCode | undefined;
  readonly error: string;
  readonly lineNumber: number;
  readonly timestamp: number;
}

/** Emitted by the first `close()` call, whatever state the session was in. */
export interface SessionClosedEvent {
  readonly type: 'session:closed';
  readonly sessionId: string;
  readonly locator: string;
  readonly recordsRead: number;
  /** State the session was in when it was closed. */
  readonly previousState: SessionState;
  readonly timestamp: number;
}

/** Discriminated union of all session events. */
export type DomainEvent = SessionOpenedEvent | SessionExhaustedEvent | SessionFailedEvent | SessionClosedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
