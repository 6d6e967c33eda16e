/**
 * Metadata envelopes.
 *
 * An envelope is the fixed subset of a run or artifact document that index
 * attributes are derived from. Each envelope is described by a field
 * descriptor table rather than a class, so the attribute encoder can walk it
 * without inspecting types at runtime.
 *
 * Before decoding, every field holds a type-specific "invalid" sentinel.
 * A field still holding its sentinel afterwards was missing (or null) in the
 * document and produces no attribute; an explicit "", 0 or false does.
 */

import { FormatError } from './errors';

export const INVALID_STRING = '?invalid';
export const INVALID_INT = 0xbadacafe;
export const INVALID_FLOAT = Number.POSITIVE_INFINITY;

export type Labels = Record<string, string>;

/**
 * One envelope field. The descriptor's key in its schema is the attribute
 * name segment; `json` is the document key it is read from.
 */
export type FieldDescriptor =
  | { kind: 'string'; json: string }
  | { kind: 'int'; json: string }
  | { kind: 'float'; json: string }
  | { kind: 'bool'; json: string }
  | { kind: 'labels'; json: string }
  | { kind: 'struct'; json: string; fields: EnvelopeSchema };

export interface EnvelopeSchema {
  [attribute: string]: FieldDescriptor;
}

export type EnvelopeValue = string | number | boolean | Labels | EnvelopeRecord | undefined;

export interface EnvelopeRecord {
  [attribute: string]: EnvelopeValue;
}

export const RUN_ENVELOPE: EnvelopeSchema = {
  metadata: {
    kind: 'struct',
    json: 'metadata',
    fields: {
      name: { kind: 'string', json: 'name' },
      uid: { kind: 'string', json: 'uid' },
      iteration: { kind: 'int', json: 'iteration' },
      project: { kind: 'string', json: 'project' },
      labels: { kind: 'labels', json: 'labels' },
    },
  },
  status: {
    kind: 'struct',
    json: 'status',
    fields: {
      state: { kind: 'string', json: 'state' },
      lasttime: { kind: 'string', json: 'last_update' },
      starttime: { kind: 'string', json: 'start_time' },
    },
  },
};

export const ARTIFACT_ENVELOPE: EnvelopeSchema = {
  name: { kind: 'string', json: 'key' },
  labels: { kind: 'labels', json: 'labels' },
};

/** Attribute path prefix that label predicates are resolved against. */
export const RUN_LABEL_PREFIX = 'metadata.labels';
export const ARTIFACT_LABEL_PREFIX = 'labels';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

/** A record with every field at its sentinel. */
export function makeInvalid(schema: EnvelopeSchema): EnvelopeRecord {
  const record: EnvelopeRecord = {};
  for (const [attribute, field] of Object.entries(schema)) {
    switch (field.kind) {
      case 'string':
        record[attribute] = INVALID_STRING;
        break;
      case 'int':
        record[attribute] = INVALID_INT;
        break;
      case 'float':
        record[attribute] = INVALID_FLOAT;
        break;
      case 'struct':
        record[attribute] = makeInvalid(field.fields);
        break;
      case 'bool':
      case 'labels':
        record[attribute] = undefined;
        break;
    }
  }
  return record;
}

/** Exact key first, then a case-insensitive match. */
function lookupKey(source: Record<string, unknown>, key: string): unknown {
  if (Object.prototype.hasOwnProperty.call(source, key)) return source[key];
  const lowered = key.toLowerCase();
  for (const candidate of Object.keys(source)) {
    if (candidate.toLowerCase() === lowered) return source[candidate];
  }
  return undefined;
}

function mismatch(path: string, expected: string, value: unknown): FormatError {
  const actual = Array.isArray(value) ? 'array' : typeof value;
  return new FormatError(`Field "${path}" must be ${expected}, got ${actual}`, { field: path, expected, actual });
}

function decodeLabels(path: string, value: unknown): Labels {
  if (!isPlainObject(value)) throw mismatch(path, 'a map of strings', value);
  const labels: Labels = {};
  for (const [key, labelValue] of Object.entries(value)) {
    if (typeof labelValue !== 'string') throw mismatch(`${path}.${key}`, 'a string', labelValue);
    labels[key] = labelValue;
  }
  return labels;
}

/**
 * Project a parsed document onto an envelope. Missing and null fields keep
 * their sentinel; a present field of the wrong kind is a FormatError.
 */
export function decodeEnvelope(schema: EnvelopeSchema, document: unknown, path = ''): EnvelopeRecord {
  const record = makeInvalid(schema);
  if (document === null || document === undefined) return record;
  if (!isPlainObject(document)) throw mismatch(path || '<root>', 'an object', document);

  for (const [attribute, field] of Object.entries(schema)) {
    const raw = lookupKey(document, field.json);
    if (raw === undefined || raw === null) continue;
    const fieldPath = path ? `${path}.${field.json}` : field.json;

    switch (field.kind) {
      case 'string':
        if (typeof raw !== 'string') throw mismatch(fieldPath, 'a string', raw);
        record[attribute] = raw;
        break;
      case 'int':
        if (typeof raw !== 'number' || !Number.isInteger(raw)) throw mismatch(fieldPath, 'an integer', raw);
        record[attribute] = raw;
        break;
      case 'float':
        if (typeof raw !== 'number') throw mismatch(fieldPath, 'a number', raw);
        record[attribute] = raw;
        break;
      case 'bool':
        if (typeof raw !== 'boolean') throw mismatch(fieldPath, 'a boolean', raw);
        record[attribute] = raw;
        break;
      case 'labels':
        record[attribute] = decodeLabels(fieldPath, raw);
        break;
      case 'struct':
        record[attribute] = decodeEnvelope(field.fields, raw, fieldPath);
        break;
    }
  }
  return record;
}
