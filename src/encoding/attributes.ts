/**
 * Attribute encoder.
 *
 * Flattens an envelope record into backend attributes: nested fields become
 * `parent.child`, label maps become one attribute per label, and every name
 * is sanitized to letters, digits and underscores. Timestamp strings are
 * additionally emitted as `<name>Epoch` in nanoseconds so that time filters
 * and sort keys can compare them numerically.
 */

import { AttributeMap } from '../domain/document';
import {
  EnvelopeRecord,
  EnvelopeSchema,
  INVALID_FLOAT,
  INVALID_INT,
  INVALID_STRING,
  decodeEnvelope,
  isPlainObject,
} from '../domain/envelope';
import { logger } from '../logger';

const log = logger.child({ module: 'attributes' });

const ENCODE_REGEX = /[^a-zA-Z0-9_]/g;

/** `YYYY-MM-DD HH:MM:SS.ffffff`, read as UTC. */
const TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{6})$/;

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_MICRO = 1_000n;

/** Replace every character outside [a-zA-Z0-9_] with `_`. Not collision-free. */
export function encodeAttributeName(name: string): string {
  return name.replace(ENCODE_REGEX, '_');
}

/** Attribute listings sort on and time filters compare against. */
export const LAST_UPDATE_EPOCH_ATTRIBUTE = encodeAttributeName('status.lasttimeEpoch');

/** Nanoseconds since the Unix epoch, or null when the string is not a timestamp. */
export function parseTimestampEpoch(value: string): bigint | null {
  const match = TIMESTAMP_REGEX.exec(value);
  if (!match) return null;
  const [year, month, day, hour, minute, second, micros] = match.slice(1).map(Number);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return BigInt(date.getTime()) * NANOS_PER_MILLI + BigInt(micros) * NANOS_PER_MICRO;
}

/**
 * Flatten an envelope record. Pure: the caller merges the result into its
 * write request. Values whose kind does not match their descriptor are
 * skipped.
 */
export function flattenEnvelope(schema: EnvelopeSchema, record: EnvelopeRecord, prefix = ''): AttributeMap {
  const result: AttributeMap = {};

  for (const [attribute, field] of Object.entries(schema)) {
    const name = prefix + attribute;
    const encodedName = encodeAttributeName(name);
    const value = record[attribute];
    if (value === undefined) continue;

    switch (field.kind) {
      case 'struct':
        if (isPlainObject(value)) {
          Object.assign(result, flattenEnvelope(field.fields, value, `${name}.`));
          continue;
        }
        break;
      case 'int':
        if (typeof value === 'number') {
          if (value !== INVALID_INT) result[encodedName] = value;
          continue;
        }
        break;
      case 'float':
        if (typeof value === 'number') {
          if (value !== INVALID_FLOAT) result[encodedName] = value;
          continue;
        }
        break;
      case 'bool':
        if (typeof value === 'boolean') {
          result[encodedName] = value;
          continue;
        }
        break;
      case 'string':
        if (typeof value === 'string') {
          if (value === INVALID_STRING) continue;
          result[encodedName] = value;
          const epoch = parseTimestampEpoch(value);
          if (epoch !== null) {
            result[encodeAttributeName(`${name}Epoch`)] = epoch;
          }
          continue;
        }
        break;
      case 'labels':
        if (isPlainObject(value)) {
          for (const [key, labelValue] of Object.entries(value)) {
            if (typeof labelValue === 'string') {
              result[encodeAttributeName(`${name}.${key}`)] = labelValue;
            }
          }
          continue;
        }
        break;
    }

    log.debug('Unsupported value for attribute, skipping', { attribute: name, kind: field.kind, actual: typeof value });
  }

  return result;
}

/** Decode a parsed document onto its envelope and flatten it. */
export function deriveAttributes(schema: EnvelopeSchema, document: unknown): AttributeMap {
  return flattenEnvelope(schema, decodeEnvelope(schema, document));
}
