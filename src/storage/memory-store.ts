/**
 * In-memory storage implementation.
 *
 * Reference backend for development and testing. Objects and items share
 * one path namespace like the remote store: deleting a path removes either.
 * Queries evaluate the same filter grammar the remote store accepts.
 *
 * Values are copied on the way in and out, so callers never alias the
 * store's internal state.
 */

import { AttributeMap, NAME_ATTRIBUTE } from '../domain/document';
import { BackendError, NotFoundError } from '../domain/errors';
import { FilterPredicate, FilterSyntaxError, compileFilter } from './filter-expression';
import { ItemCursor, QueryInput, StoreClient, StoreItem, selectAttributes } from './store-client';

function copyAttributes(attributes: AttributeMap): AttributeMap {
  const copy: AttributeMap = {};
  for (const [name, value] of Object.entries(attributes)) {
    copy[name] = Buffer.isBuffer(value) ? Buffer.from(value) : value;
  }
  return copy;
}

function itemName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/** Cursor over an already materialized result. */
class MemoryItemCursor implements ItemCursor {
  constructor(private items: StoreItem[]) {}

  async all(): Promise<StoreItem[]> {
    const items = this.items;
    this.items = [];
    return items;
  }
}

export class MemoryStoreClient implements StoreClient {
  private objects = new Map<string, Buffer>();
  private items = new Map<string, AttributeMap>();

  async putObject(path: string, body: Buffer): Promise<void> {
    this.objects.set(path, Buffer.from(body));
  }

  async getObject(path: string): Promise<Buffer> {
    const body = this.objects.get(path);
    if (!body) throw new NotFoundError(path);
    return Buffer.from(body);
  }

  async getItem(path: string, attributeNames: string[]): Promise<StoreItem> {
    const attributes = this.items.get(path);
    if (!attributes) throw new NotFoundError(path);
    return new StoreItem(copyAttributes(selectAttributes(this.withName(path, attributes), attributeNames)));
  }

  async putItem(path: string, attributes: AttributeMap): Promise<void> {
    if (path.endsWith('/')) {
      throw new BackendError(path, 400, `Item path must not end with "/": ${path}`);
    }
    this.items.set(path, copyAttributes(attributes));
  }

  async updateItem(path: string, attributes: AttributeMap): Promise<void> {
    if (path.endsWith('/')) {
      throw new BackendError(path, 400, `Item path must not end with "/": ${path}`);
    }
    const existing = this.items.get(path) ?? {};
    this.items.set(path, { ...existing, ...copyAttributes(attributes) });
  }

  async deleteObject(path: string): Promise<void> {
    const removedObject = this.objects.delete(path);
    const removedItem = this.items.delete(path);
    if (!removedObject && !removedItem) throw new NotFoundError(path);
  }

  async query(input: QueryInput): Promise<ItemCursor> {
    const prefix = input.path.endsWith('/') ? input.path : `${input.path}/`;
    if (!this.prefixExists(prefix)) throw new NotFoundError(prefix);

    let predicate: FilterPredicate;
    try {
      predicate = compileFilter(input.filter);
    } catch (err) {
      if (err instanceof FilterSyntaxError) {
        throw new BackendError(prefix, 400, `Invalid filter expression: ${err.message}`);
      }
      throw err;
    }

    const matches: StoreItem[] = [];
    for (const [path, attributes] of this.items) {
      if (!path.startsWith(prefix) || path.slice(prefix.length).includes('/')) continue;
      const named = this.withName(path, attributes);
      if (!predicate(named)) continue;
      matches.push(new StoreItem(copyAttributes(selectAttributes(named, input.attributeNames))));
    }
    return new MemoryItemCursor(matches);
  }

  private withName(path: string, attributes: AttributeMap): AttributeMap {
    return { ...attributes, [NAME_ATTRIBUTE]: itemName(path) };
  }

  private prefixExists(prefix: string): boolean {
    for (const path of this.items.keys()) {
      if (path.startsWith(prefix)) return true;
    }
    for (const path of this.objects.keys()) {
      if (path.startsWith(prefix)) return true;
    }
    return false;
  }
}

/** Create an empty in-memory store. */
export function createMemoryStore(): MemoryStoreClient {
  return new MemoryStoreClient();
}
