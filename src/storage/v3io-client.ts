/**
 * v3io web API store client.
 *
 * Objects are plain PUT/GET/DELETE on `<endpoint>/<container><path>`. Item
 * operations POST or PUT a JSON body and name the operation in the
 * `X-v3io-function` header. Attribute values travel typed: `S` strings,
 * `N` numbers (as decimal strings), `B` base64 bytes, `BOOL` booleans.
 *
 * No retries: a failed call surfaces immediately as NotFoundError (404) or
 * BackendError with the response status.
 */

import { AttributeMap, AttributeValue } from '../domain/document';
import { BackendError, NotFoundError, maskSecretsInMessage } from '../domain/errors';
import { isPlainObject } from '../domain/envelope';
import { logger } from '../logger';
import { ItemCursor, QueryInput, StoreClient, StoreItem } from './store-client';

/** Injectable for testing. */
export type FetchFn = typeof fetch;

export interface V3ioClientOptions {
  /** Web API base URL, e.g. `http://v3io-webapi:8081`. */
  endpoint: string;
  container: string;
  accessKey?: string;
  /** Items per GetItems page. */
  pageLimit?: number;
  fetchFn?: FetchFn;
}

/** Typed attribute value on the wire. */
export type WireValue = { S: string } | { N: string } | { B: string } | { BOOL: boolean };

const log = logger.child({ module: 'v3io-client' });

const DEFAULT_PAGE_LIMIT = 1000;

export function encodeWireValue(value: AttributeValue): WireValue {
  if (Buffer.isBuffer(value)) return { B: value.toString('base64') };
  switch (typeof value) {
    case 'string':
      return { S: value };
    case 'boolean':
      return { BOOL: value };
    default:
      return { N: value.toString() };
  }
}

/** Integers outside Number's safe range decode to bigint. */
export function decodeWireValue(wire: unknown): AttributeValue | undefined {
  if (!isPlainObject(wire)) return undefined;
  if (typeof wire.S === 'string') return wire.S;
  if (typeof wire.BOOL === 'boolean') return wire.BOOL;
  if (typeof wire.B === 'string') return Buffer.from(wire.B, 'base64');
  if (typeof wire.N === 'string') {
    if (/^-?\d+$/.test(wire.N)) {
      const big = BigInt(wire.N);
      return big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(big) : big;
    }
    const num = Number(wire.N);
    return Number.isNaN(num) ? undefined : num;
  }
  return undefined;
}

function encodeItem(attributes: AttributeMap): Record<string, WireValue> {
  const item: Record<string, WireValue> = {};
  for (const [name, value] of Object.entries(attributes)) {
    item[name] = encodeWireValue(value);
  }
  return item;
}

function decodeItem(item: unknown): AttributeMap {
  const attributes: AttributeMap = {};
  if (!isPlainObject(item)) return attributes;
  for (const [name, wire] of Object.entries(item)) {
    const value = decodeWireValue(wire);
    if (value !== undefined) attributes[name] = value;
  }
  return attributes;
}

interface ItemsPage {
  items: StoreItem[];
  nextMarker?: string;
  last: boolean;
}

/** Cursor that fetches GetItems pages until the backend reports the last one. */
class V3ioItemCursor implements ItemCursor {
  constructor(
    private firstPage: ItemsPage,
    private fetchPage: (marker: string) => Promise<ItemsPage>,
  ) {}

  async all(): Promise<StoreItem[]> {
    const items = [...this.firstPage.items];
    let page = this.firstPage;
    while (!page.last && page.nextMarker) {
      page = await this.fetchPage(page.nextMarker);
      items.push(...page.items);
    }
    return items;
  }
}

export class V3ioStoreClient implements StoreClient {
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;
  private readonly pageLimit: number;

  constructor(private options: V3ioClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = `${options.endpoint.replace(/\/+$/, '')}/${options.container}`;
    this.pageLimit = options.pageLimit ?? DEFAULT_PAGE_LIMIT;
  }

  async putObject(path: string, body: Buffer): Promise<void> {
    await this.request(path, 'PUT', { body });
  }

  async getObject(path: string): Promise<Buffer> {
    const res = await this.request(path, 'GET', {});
    return Buffer.from(await res.arrayBuffer());
  }

  async getItem(path: string, attributeNames: string[]): Promise<StoreItem> {
    const res = await this.request(path, 'PUT', {
      fn: 'GetItem',
      json: { AttributesToGet: attributeNames.join(',') },
    });
    const payload = await this.readJson(path, res);
    return new StoreItem(decodeItem(payload.Item));
  }

  /** PutItem replaces any existing item as a whole. */
  async putItem(path: string, attributes: AttributeMap): Promise<void> {
    await this.request(path, 'PUT', {
      fn: 'PutItem',
      json: { Item: encodeItem(attributes) },
    });
  }

  async updateItem(path: string, attributes: AttributeMap): Promise<void> {
    await this.request(path, 'POST', {
      fn: 'UpdateItem',
      json: { UpdateMode: 'CreateOrReplaceAttributes', Item: encodeItem(attributes) },
    });
  }

  async deleteObject(path: string): Promise<void> {
    await this.request(path, 'DELETE', {});
  }

  async query(input: QueryInput): Promise<ItemCursor> {
    const fetchPage = (marker?: string) => this.getItemsPage(input, marker);
    const firstPage = await fetchPage();
    return new V3ioItemCursor(firstPage, fetchPage);
  }

  private async getItemsPage(input: QueryInput, marker?: string): Promise<ItemsPage> {
    const body: Record<string, unknown> = {
      AttributesToGet: input.attributeNames.join(','),
      Limit: this.pageLimit,
    };
    if (input.filter) body.Filter = input.filter;
    if (marker) body.Marker = marker;

    const res = await this.request(input.path, 'PUT', { fn: 'GetItems', json: body });
    const payload = await this.readJson(input.path, res);
    const rawItems = Array.isArray(payload.Items) ? payload.Items : [];
    return {
      items: rawItems.map((item: unknown) => new StoreItem(decodeItem(item))),
      nextMarker: typeof payload.NextMarker === 'string' ? payload.NextMarker : undefined,
      last: payload.LastItemIncluded !== 'FALSE',
    };
  }

  private async request(
    path: string,
    method: string,
    params: { fn?: string; json?: unknown; body?: Buffer },
  ): Promise<Response> {
    const headers: Record<string, string> = {};
    if (this.options.accessKey) headers['X-v3io-session-key'] = this.options.accessKey;
    if (params.fn) headers['X-v3io-function'] = params.fn;
    if (params.json !== undefined) headers['Content-Type'] = 'application/json';
    const body = params.json !== undefined
      ? JSON.stringify(params.json)
      : params.body ? new Uint8Array(params.body) : undefined;

    log.debug('Store request', { method, path, fn: params.fn });
    const res = await this.fetchFn(`${this.baseUrl}${path}`, { method, headers, body });
    if (res.ok) return res;

    const text = await res.text();
    if (res.status === 404) throw new NotFoundError(path);
    // the backend may echo the session key back in its error body
    const message = `${params.fn ?? method} ${path} failed with status ${res.status}: ${text}`;
    throw new BackendError(path, res.status, maskSecretsInMessage(message, [this.options.accessKey ?? '']));
  }

  private async readJson(path: string, res: Response): Promise<Record<string, unknown>> {
    const text = await res.text();
    if (text.trim() === '') return {};
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new BackendError(path, 502, `Store returned a non-JSON body for ${path}`);
    }
    if (!isPlainObject(payload)) {
      throw new BackendError(path, 502, `Store returned an unexpected body for ${path}`);
    }
    return payload;
  }
}
