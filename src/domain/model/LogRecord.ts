import type { FieldValue } from './FieldType.js';

/** One parsed data line. Frozen on creation. */
export interface LogRecord {
  /** 1-based line number in the decoded stream (header lines included). */
  readonly lineNumber: number;
  /** Raw tab-separated tokens, in column order, before any coercion. */
  readonly tokens: readonly string[];
  /** Typed values keyed by field name. */
  readonly values: Readonly<Record<string, FieldValue>>;
  /**
   * Request instant built from the `date` and `time` fields, in UTC.
   * `null` when either is absent or the schema declares neither.
   */
  readonly timestamp: Date | null;
}
