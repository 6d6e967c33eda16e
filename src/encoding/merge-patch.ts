/**
 * Dot-path merge patch.
 *
 * A patch is a JSON object whose keys are dot-separated paths into the
 * stored document (`"status.state"`) and whose values replace whatever is
 * at that path. Missing intermediate objects are created, scalars in the
 * way are replaced by objects, numeric segments index existing arrays
 * (`-1` or the array's length appends), and `\.` keeps a literal dot inside
 * a segment. Paths the patch does not name
 * are left untouched.
 *
 * Keys are applied in the patch's own order, so overlapping paths resolve
 * last-applied-wins.
 */

import { isPlainObject } from '../domain/envelope';
import { ParseError } from '../domain/errors';

type Container = Record<string, unknown> | unknown[];

/** Split on unescaped dots. */
export function splitPath(path: string): string[] {
  const segments: string[] = [];
  let current = '';
  for (let i = 0; i < path.length; i++) {
    const char = path[i];
    if (char === '\\' && path[i + 1] === '.') {
      current += '.';
      i++;
    } else if (char === '.') {
      segments.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  segments.push(current);
  return segments;
}

function parseObject(json: Buffer | string, what: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(json.toString());
  } catch (err) {
    throw new ParseError(`${what} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isPlainObject(value)) {
    throw new ParseError(`${what} must be a JSON object`);
  }
  return value;
}

/** Parse and check a patch document without applying it. */
export function parsePatch(patchJSON: Buffer | string): Record<string, unknown> {
  return parseObject(patchJSON, 'Patch');
}

/** `-1` means append. */
function arrayIndex(segment: string): number | null {
  return /^(\d+|-1)$/.test(segment) ? Number(segment) : null;
}

function getChild(container: Container, segment: string): unknown {
  if (Array.isArray(container)) {
    const index = arrayIndex(segment);
    return index === null ? undefined : container[index];
  }
  return Object.prototype.hasOwnProperty.call(container, segment) ? container[segment] : undefined;
}

function setChild(container: Container, segment: string, value: unknown, path: string): void {
  if (Array.isArray(container)) {
    const index = arrayIndex(segment);
    if (index === null) {
      throw new ParseError(`Patch path "${path}" uses key "${segment}" on an array`);
    }
    if (index === -1 || index === container.length) {
      container.push(value);
    } else if (index < container.length) {
      container[index] = value;
    } else {
      throw new ParseError(
        `Patch path "${path}" index ${index} is past the end of an array of length ${container.length}`,
      );
    }
    return;
  }
  // defineProperty so that a "__proto__" segment stays an ordinary key
  Object.defineProperty(container, segment, { value, writable: true, enumerable: true, configurable: true });
}

/** Set `value` at `path` inside `root`, creating objects along the way. */
export function setPath(root: Record<string, unknown>, path: string, value: unknown): void {
  const segments = splitPath(path);
  let cursor: Container = root;
  for (const segment of segments.slice(0, -1)) {
    const next = getChild(cursor, segment);
    if (isPlainObject(next) || Array.isArray(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      setChild(cursor, segment, created, path);
      cursor = created;
    }
  }
  setChild(cursor, segments[segments.length - 1], value, path);
}

/**
 * Apply `patchJSON` onto `oldJSON` and return the merged JSON. An empty
 * old document is treated as `{}`.
 */
export function applyDotPathPatch(oldJSON: Buffer | string, patchJSON: Buffer | string): Buffer {
  const patch = parsePatch(patchJSON);
  const document = oldJSON.toString().trim() === '' ? {} : parseObject(oldJSON, 'Stored document');
  for (const [path, value] of Object.entries(patch)) {
    setPath(document, path, value);
  }
  return Buffer.from(JSON.stringify(document));
}
