/**
 * Semantic type of a log field, as resolved from its name in the header.
 *
 * - `timestampComponent`: the `date` or `time` half of the request instant.
 * - `enumeratedToken`: a value drawn from a small documented set (`GET`, `Hit`, `TLSv1.3`).
 */
export type FieldType = 'string' | 'integer' | 'float' | 'timestampComponent' | 'enumeratedToken';

/** A typed field value. `null` stands for the `-` absent-value token. */
export type FieldValue = string | number | null;

/** Token the CDN writes for a field that has no value on this request. */
export const ABSENT_VALUE = '-';

/** Separator between fields on a data line. */
export const FIELD_DELIMITER = '\t';
