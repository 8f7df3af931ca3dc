import type { FieldDefinition, LogHeader } from '../model/FieldSchema.js';
import { resolveField } from '../model/CloudFrontFields.js';
import { MalformedHeaderError } from '../errors/LogReaderError.js';

const VERSION_LINE = /^#Version:[ \t]*(\S+)[ \t]*$/;
const FIELDS_LINE = /^#Fields:[ \t]*(.*)$/;

/**
 * Parse the two comment lines that open every CloudFront log stream.
 *
 * ```
 * #Version: 1.0
 * #Fields: date time x-edge-location sc-bytes c-ip ...
 * ```
 *
 * Field names are resolved against the version's type table; names the table
 * does not know are read as plain strings.
 *
 * @throws MalformedHeaderError when either line is missing or does not match its grammar,
 * or when the fields line is empty or repeats a name.
 */
export function parseHeader(versionLine: string | undefined, fieldsLine: string | undefined): LogHeader {
  if (versionLine === undefined) {
    throw new MalformedHeaderError('missing #Version line', 1, null);
  }
  const versionMatch = VERSION_LINE.exec(versionLine);
  if (!versionMatch?.[1]) {
    throw new MalformedHeaderError("expected '#Version: <version>'", 1, versionLine);
  }
  const version = versionMatch[1];

  if (fieldsLine === undefined) {
    throw new MalformedHeaderError('missing #Fields line', 2, null);
  }
  const fieldsMatch = FIELDS_LINE.exec(fieldsLine);
  if (!fieldsMatch) {
    throw new MalformedHeaderError("expected '#Fields: <name> <name> ...'", 2, fieldsLine);
  }

  const names = (fieldsMatch[1] ?? '').split(/\s+/).filter((name) => name.length > 0);
  if (names.length === 0) {
    throw new MalformedHeaderError('#Fields line declares no fields', 2, fieldsLine);
  }

  const seen = new Set<string>();
  const schema: FieldDefinition[] = [];
  for (const [index, name] of names.entries()) {
    if (seen.has(name)) {
      throw new MalformedHeaderError(`field '${name}' is declared twice`, 2, fieldsLine);
    }
    seen.add(name);

    const known = resolveField(version, name);
    schema.push(
      Object.freeze({
        name,
        index,
        type: known.type,
        percentEncoded: known.percentEncoded ?? false,
      }),
    );
  }

  return Object.freeze({ version, schema: Object.freeze(schema) });
}
