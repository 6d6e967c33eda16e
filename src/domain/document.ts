/**
 * Stored document model: attribute values, reserved attribute names and the
 * hierarchical paths runs, artifacts and logs live under.
 */

/** A single scalar stored alongside a document in the backend. */
export type AttributeValue = string | number | bigint | boolean | Buffer;

/** Sanitized attribute name → scalar. */
export type AttributeMap = Record<string, AttributeValue>;

/** The attribute holding the verbatim document bytes. */
export const DATA_ATTRIBUTE = '_data_';

/** Backend-maintained attribute holding the item's own name (last path segment). */
export const NAME_ATTRIBUTE = '__name';

/** Encoding a document was received in. */
export enum DocumentFormat {
  Yaml = 'yaml',
  Json = 'json',
}

/** Artifact tag used when none is given. */
export const DEFAULT_TAG = 'latest';

/** Listing/deletion tag meaning "any tag". */
export const ANY_TAG = '*';

/** Tag for storing and point reads: empty means the default tag. */
export function resolveTag(tag?: string): string {
  return tag ? tag : DEFAULT_TAG;
}

/**
 * Tag for list and delete-by-query filters: empty means the default tag,
 * the wildcard means no tag filter at all.
 */
export function resolveTagFilter(tag?: string): string | undefined {
  const resolved = resolveTag(tag);
  return resolved === ANY_TAG ? undefined : resolved;
}

export function runsPrefix(project: string): string {
  return `/run/${project}/`;
}

export function runPath(project: string, uid: string): string {
  return `${runsPrefix(project)}${uid}`;
}

export function artifactsPrefix(project: string): string {
  return `/artifact/${project}/`;
}

/** `version` is either a run uid or a tag. */
export function artifactPath(project: string, key: string, version: string): string {
  return `${artifactsPrefix(project)}${key}.${version}`;
}

export function logPath(project: string, uid: string): string {
  return `/log/${project}-${uid}`;
}
