import type { FieldDefinition, FieldSchema } from '../model/FieldSchema.js';
import type { FieldValue } from '../model/FieldType.js';
import type { LogRecord } from '../model/LogRecord.js';
import { ABSENT_VALUE, FIELD_DELIMITER } from '../model/FieldType.js';
import { findField } from '../model/FieldSchema.js';
import { FieldCountMismatchError, FieldTypeError } from '../errors/LogReaderError.js';

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME = /^(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/**
 * Parse one tab-separated data line against the stream's schema.
 *
 * Pure: the same line and schema always produce field-equal records.
 *
 * @param lineNumber - 1-based position of the line, reported in errors and kept on the record.
 * @throws FieldCountMismatchError when the token count differs from the schema length.
 * @throws FieldTypeError when a token cannot be read as its field's type.
 */
export function parseRecord(line: string, schema: FieldSchema, lineNumber = 0): LogRecord {
  const tokens = line.split(FIELD_DELIMITER);
  if (tokens.length !== schema.length) {
    throw new FieldCountMismatchError(lineNumber, line, schema.length, tokens.length);
  }

  // Header names are arbitrary text, `__proto__` included, so every value is an own property.
  const values: Readonly<Record<string, FieldValue>> = Object.fromEntries(
    schema.map((field) => [field.name, coerce(field, tokens[field.index] ?? ABSENT_VALUE, lineNumber, line)] as const),
  );

  return Object.freeze({
    lineNumber,
    tokens: Object.freeze(tokens),
    values: Object.freeze(values),
    timestamp: combineTimestamp(schema, values),
  });
}

/** Re-join a record's fields in schema order, writing `-` for absent values. */
export function serializeRecord(record: LogRecord, schema: FieldSchema): string {
  return schema
    .map((field) => (record.values[field.name] === null ? ABSENT_VALUE : (record.tokens[field.index] ?? ABSENT_VALUE)))
    .join(FIELD_DELIMITER);
}

function coerce(field: FieldDefinition, token: string, lineNumber: number, line: string): FieldValue {
  if (token === ABSENT_VALUE) return null;

  switch (field.type) {
    case 'integer':
      return parseInteger(field, token, lineNumber, line);
    case 'float':
      if (!FLOAT.test(token)) throw new FieldTypeError(field.name, token, 'float', lineNumber, line);
      return Number.parseFloat(token);
    case 'timestampComponent': {
      const valid = field.name === 'time' ? isValidTime(token) : isValidDate(token);
      if (!valid) {
        throw new FieldTypeError(field.name, token, field.name === 'time' ? 'time' : 'date', lineNumber, line);
      }
      return token;
    }
    case 'enumeratedToken':
    case 'string':
      return field.percentEncoded ? percentDecode(field, token, lineNumber, line) : token;
  }
}

/** Integers beyond 2^53 cannot be held exactly in a number and are rejected. */
function parseInteger(field: FieldDefinition, token: string, lineNumber: number, line: string): number {
  const value = INTEGER.test(token) ? Number.parseInt(token, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) throw new FieldTypeError(field.name, token, 'integer', lineNumber, line);
  return value;
}

function isValidDate(token: string): boolean {
  const match = DATE.exec(token);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return false;
  const leapDay = month === 2 && isLeapYear(year) ? 1 : 0;
  return day >= 1 && day <= (DAYS_IN_MONTH[month - 1] ?? 0) + leapDay;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function isValidTime(token: string): boolean {
  const match = TIME.exec(token);
  if (!match) return false;
  return Number(match[1]) <= 23 && Number(match[2]) <= 59 && Number(match[3]) <= 59;
}

function percentDecode(field: FieldDefinition, token: string, lineNumber: number, line: string): string {
  try {
    return decodeURIComponent(token);
  } catch (error) {
    if (error instanceof URIError) {
      throw new FieldTypeError(field.name, token, 'percent-encoded string', lineNumber, line);
    }
    throw error;
  }
}

/** Both halves were range-checked by `coerce`, so the instant is always valid. */
function combineTimestamp(schema: FieldSchema, values: Readonly<Record<string, FieldValue>>): Date | null {
  if (!findField(schema, 'date') || !findField(schema, 'time')) return null;

  const date = values['date'];
  const time = values['time'];
  if (typeof date !== 'string' || typeof time !== 'string') return null;

  return new Date(`${date}T${time}Z`);
}
