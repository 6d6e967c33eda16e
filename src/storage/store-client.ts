/**
 * Storage layer interfaces.
 *
 * The contract the service needs from the backend document store: object
 * reads and writes, whole-item writes, attribute-level item upserts, and
 * filtered queries over
 * the items directly under a path prefix. Implementations report a missing
 * path as NotFoundError and any other failure as BackendError carrying the
 * backend's status code.
 */

import { AttributeMap } from '../domain/document';

/** Query over the items directly under `path`. */
export interface QueryInput {
  /** Directory prefix, ending with `/`. */
  path: string;
  /** Attributes to return for each item; `*` returns all of them. */
  attributeNames: string[];
  /** Backend filter expression; empty matches everything. */
  filter?: string;
}

/** A backend item with typed field accessors. */
export class StoreItem {
  constructor(public readonly attributes: AttributeMap) {}

  getFieldString(name: string): string | undefined {
    const value = this.attributes[name];
    return typeof value === 'string' ? value : undefined;
  }

  /** Integer fields as bigint; epoch nanoseconds exceed Number's safe range. */
  getFieldInt(name: string): bigint | undefined {
    const value = this.attributes[name];
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
    return undefined;
  }

  getFieldBytes(name: string): Buffer | undefined {
    const value = this.attributes[name];
    if (Buffer.isBuffer(value)) return value;
    if (typeof value === 'string') return Buffer.from(value);
    return undefined;
  }
}

/** Handle over a query's matching items. */
export interface ItemCursor {
  /** Drain every remaining page. */
  all(): Promise<StoreItem[]>;
}

/** Backend document store. */
export interface StoreClient {
  /** Full object write. */
  putObject(path: string, body: Buffer): Promise<void>;
  getObject(path: string): Promise<Buffer>;
  getItem(path: string, attributeNames: string[]): Promise<StoreItem>;
  /** Whole-item write: the item ends up holding exactly `attributes`. */
  putItem(path: string, attributes: AttributeMap): Promise<void>;
  /** Attribute-level upsert: named attributes are replaced, others kept. */
  updateItem(path: string, attributes: AttributeMap): Promise<void>;
  deleteObject(path: string): Promise<void>;
  /** NotFoundError when the prefix does not exist. */
  query(input: QueryInput): Promise<ItemCursor>;
}

/** Keep only the requested attributes (`*` keeps all). */
export function selectAttributes(attributes: AttributeMap, names: string[]): AttributeMap {
  if (names.includes('*')) return { ...attributes };
  const selected: AttributeMap = {};
  for (const name of names) {
    if (Object.prototype.hasOwnProperty.call(attributes, name)) selected[name] = attributes[name];
  }
  return selected;
}
