import type { FieldType } from './FieldType.js';
import type { LogFormatVersion } from './FieldSchema.js';

/** How a known field name is read. */
export interface KnownField {
  readonly type: FieldType;
  readonly percentEncoded?: boolean;
}

/** CloudFront standard log fields, in the order CloudFront writes them. */
const STANDARD_FIELDS_V1: ReadonlyMap<string, KnownField> = new Map(
  Object.entries<KnownField>({
    date: { type: 'timestampComponent' },
    time: { type: 'timestampComponent' },
    'x-edge-location': { type: 'string' },
    'sc-bytes': { type: 'integer' },
    'c-ip': { type: 'string' },
    'cs-method': { type: 'enumeratedToken' },
    'cs(Host)': { type: 'string' },
    'cs-uri-stem': { type: 'string' },
    'sc-status': { type: 'integer' },
    'cs(Referer)': { type: 'string', percentEncoded: true },
    'cs(User-Agent)': { type: 'string', percentEncoded: true },
    'cs-uri-query': { type: 'string' },
    'cs(Cookie)': { type: 'string', percentEncoded: true },
    'x-edge-result-type': { type: 'enumeratedToken' },
    'x-edge-request-id': { type: 'string' },
    'x-host-header': { type: 'string' },
    'cs-protocol': { type: 'enumeratedToken' },
    'cs-bytes': { type: 'integer' },
    'time-taken': { type: 'float' },
    'x-forwarded-for': { type: 'string' },
    'ssl-protocol': { type: 'enumeratedToken' },
    'ssl-cipher': { type: 'enumeratedToken' },
    'x-edge-response-result-type': { type: 'enumeratedToken' },
    'cs-protocol-version': { type: 'enumeratedToken' },
    'fle-status': { type: 'enumeratedToken' },
    'fle-encrypted-fields': { type: 'integer' },
    'c-port': { type: 'integer' },
    'time-to-first-byte': { type: 'float' },
    'x-edge-detailed-result-type': { type: 'enumeratedToken' },
    'sc-content-type': { type: 'string' },
    'sc-content-len': { type: 'integer' },
    'sc-range-start': { type: 'integer' },
    'sc-range-end': { type: 'integer' },
  }),
);

const FIELDS_BY_VERSION: ReadonlyMap<LogFormatVersion, ReadonlyMap<string, KnownField>> = new Map([
  ['1.0', STANDARD_FIELDS_V1],
]);

/** Newest version this build knows; unrecognised versions are read against it. */
export const LATEST_KNOWN_VERSION: LogFormatVersion = '1.0';

const OPAQUE_FIELD: KnownField = { type: 'string' };

export function isKnownVersion(version: LogFormatVersion): boolean {
  return FIELDS_BY_VERSION.has(version);
}

/**
 * Resolve a header field name to its read rules for the given format version.
 * Names the table does not know are opaque strings, so newer CloudFront fields never break reading.
 */
export function resolveField(version: LogFormatVersion, name: string): KnownField {
  const table = FIELDS_BY_VERSION.get(version) ?? FIELDS_BY_VERSION.get(LATEST_KNOWN_VERSION);
  return table?.get(name) ?? OPAQUE_FIELD;
}
