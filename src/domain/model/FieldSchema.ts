import type { FieldType } from './FieldType.js';

/** One column of a log stream, resolved from the `#Fields` header line. */
export interface FieldDefinition {
  /** Field name exactly as declared in the header (e.g. `cs(User-Agent)`). */
  readonly name: string;
  /** Zero-based column position on a data line. */
  readonly index: number;
  readonly type: FieldType;
  /** When `true`, the token is percent-decoded on read. */
  readonly percentEncoded: boolean;
}

/** Ordered, immutable field list shared by every record of one stream. */
export type FieldSchema = readonly FieldDefinition[];

/** Version tag from the `#Version` line, kept verbatim (e.g. `'1.0'`). */
export type LogFormatVersion = string;

/** Parsed header of a log stream. */
export interface LogHeader {
  readonly version: LogFormatVersion;
  readonly schema: FieldSchema;
}

/** Look up a field definition by its declared name. */
export function findField(schema: FieldSchema, name: string): FieldDefinition | undefined {
  return schema.find((field) => field.name === name);
}

/** Return the declared field names in column order. */
export function fieldNames(schema: FieldSchema): string[] {
  return schema.map((field) => field.name);
}
