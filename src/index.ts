// Main entry point
export { LogReader } from './LogReader.js';
export type { LogReaderConfig } from './LogReader.js';

// Session
export { LogSession } from './application/LogSession.js';
export type { LogSessionOptions } from './application/LogSession.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorFn } from './application/EventBus.js';

// Domain model
export type { FieldType, FieldValue } from './domain/model/FieldType.js';
export { ABSENT_VALUE, FIELD_DELIMITER } from './domain/model/FieldType.js';
export type { FieldDefinition, FieldSchema, LogFormatVersion, LogHeader } from './domain/model/FieldSchema.js';
export { findField, fieldNames } from './domain/model/FieldSchema.js';
export type { LogRecord } from './domain/model/LogRecord.js';
export { SessionState, canTransition } from './domain/model/SessionState.js';
export type { KnownField } from './domain/model/CloudFrontFields.js';
export { LATEST_KNOWN_VERSION, isKnownVersion, resolveField } from './domain/model/CloudFrontFields.js';

// Domain services (pure, usable without a session)
export { parseHeader } from './domain/services/FormatHeader.js';
export { parseRecord, serializeRecord } from './domain/services/RecordParser.js';
export { formatTimestamp } from './domain/services/TimestampFormatter.js';

// Errors
export {
  LogReaderError,
  SourceUnavailableError,
  MalformedHeaderError,
  FieldCountMismatchError,
  FieldTypeError,
  NoCurrentRecordError,
  UnknownFieldError,
  SessionClosedError,
  isLogReaderError,
} from './domain/errors/LogReaderError.js';
export type { LogReaderErrorCode } from './domain/errors/LogReaderError.js';

// Ports (for custom implementations)
export type { ByteSource, SourceMetadata } from './domain/ports/ByteSource.js';
export type { ObjectStore, ObjectLocation, StoredObject } from './domain/ports/ObjectStore.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SessionOpenedEvent,
  SessionExhaustedEvent,
  SessionFailedEvent,
  SessionClosedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { S3ObjectSource } from './infrastructure/sources/S3ObjectSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { S3ObjectStore } from './infrastructure/stores/S3ObjectStore.js';
export type { S3ObjectStoreOptions } from './infrastructure/stores/S3ObjectStore.js';
export { decodeLines, hasGzipMagic } from './infrastructure/lines/decodeLines.js';
export type { CompressionMode, DecodeLinesOptions } from './infrastructure/lines/decodeLines.js';
export { parseLocator } from './infrastructure/locator.js';
export type { SourceLocator } from './infrastructure/locator.js';
export { createLogger, attachLogger } from './infrastructure/logging/logger.js';
export type { Logger, LoggerOptions } from './infrastructure/logging/logger.js';
