/**
 * Document codec: YAML ↔ JSON.
 *
 * A document that starts with the YAML document marker is YAML, anything
 * else is JSON. A JSON document that happens to start with `---` is
 * misclassified; that is accepted.
 */

import { parse, stringify } from 'yaml';
import { DocumentFormat } from '../domain/document';
import { FormatError } from '../domain/errors';

const YAML_MARKER = '---';

export function detectFormat(data: Buffer): DocumentFormat {
  return data.subarray(0, YAML_MARKER.length).toString('utf8') === YAML_MARKER
    ? DocumentFormat.Yaml
    : DocumentFormat.Json;
}

/**
 * JSON bytes for a document. JSON input is returned as-is, unvalidated.
 * YAML is read with the 1.2 core schema: an unquoted `0123` is the integer
 * 123, so a YAML document re-encoded after a patch writes it as `123`.
 */
export function toJSON(data: Buffer): Buffer {
  if (detectFormat(data) === DocumentFormat.Json) return data;
  let value: unknown;
  try {
    value = parse(data.toString('utf8'));
  } catch (err) {
    throw new FormatError(`Malformed YAML document: ${err instanceof Error ? err.message : String(err)}`);
  }
  return Buffer.from(JSON.stringify(value ?? null));
}

/** Parse JSON bytes, reporting malformed input as a FormatError. */
export function parseJSON(json: Buffer): unknown {
  try {
    return JSON.parse(json.toString('utf8'));
  } catch (err) {
    throw new FormatError(`Malformed JSON document: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Parse a document of either format. */
export function parseDocument(data: Buffer): unknown {
  return parseJSON(toJSON(data));
}

/**
 * Encode JSON bytes back into `format`. YAML output keeps the leading
 * document marker so the result is detected as YAML again.
 */
export function fromJSON(json: Buffer, format: DocumentFormat): Buffer {
  if (format === DocumentFormat.Json) return json;
  return Buffer.from(`${YAML_MARKER}\n${stringify(parseJSON(json))}`);
}
