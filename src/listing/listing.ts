/**
 * Listing engine.
 *
 * Drains a query cursor, orders the matches most-recent first by their
 * last-update epoch, truncates to the requested size and wraps the raw
 * stored blobs in a JSON envelope. Blobs are concatenated verbatim, never
 * re-serialized.
 */

import { DATA_ATTRIBUTE } from '../domain/document';
import { LAST_UPDATE_EPOCH_ATTRIBUTE } from '../encoding/attributes';
import { ItemCursor, StoreItem } from '../storage/store-client';
import { logger } from '../logger';

const log = logger.child({ module: 'listing' });

/** Run listing size when the request does not give one. */
export const DEFAULT_RUN_LIMIT = 30;

export interface ListingOptions {
  sort: boolean;
  /** 0 means unbounded. */
  limit: number;
}

export type ListingKind = 'runs' | 'artifacts';

interface ListingEntry {
  key: bigint;
  blob: Buffer;
}

/**
 * Order and truncate matched items. Items without a last-update epoch get
 * an incrementing synthetic key starting at 0, below any real epoch. Equal
 * keys keep arrival order.
 */
export function collectListing(items: StoreItem[], options: ListingOptions): Buffer[] {
  const entries: ListingEntry[] = [];
  let syntheticKey = 0n;

  for (const item of items) {
    const blob = item.getFieldBytes(DATA_ATTRIBUTE);
    if (!blob) {
      log.warn('Listed item has no document attribute, skipping', { attributes: Object.keys(item.attributes) });
      continue;
    }
    let key = item.getFieldInt(LAST_UPDATE_EPOCH_ATTRIBUTE);
    if (key === undefined) {
      key = syntheticKey;
      syntheticKey++;
    }
    entries.push({ key, blob });
  }

  if (options.sort || options.limit > 0) {
    // Array.prototype.sort is stable
    entries.sort((a, b) => (a.key === b.key ? 0 : a.key > b.key ? -1 : 1));
  }
  const retained = options.limit > 0 ? entries.slice(0, options.limit) : entries;
  return retained.map((entry) => entry.blob);
}

/** Pull the full result set from a cursor and order it. */
export async function listDocuments(cursor: ItemCursor, options: ListingOptions): Promise<Buffer[]> {
  return collectListing(await cursor.all(), options);
}

/** `{"runs": [<blob>,<blob>]}` */
export function renderListing(kind: ListingKind, blobs: Buffer[]): Buffer {
  const parts: Buffer[] = [Buffer.from(`{"${kind}": [`)];
  blobs.forEach((blob, index) => {
    if (index > 0) parts.push(Buffer.from(','));
    parts.push(blob);
  });
  parts.push(Buffer.from(']}'));
  return Buffer.concat(parts);
}

/** `{"data": <blob>}` */
export function renderDocument(blob: Buffer): Buffer {
  return Buffer.concat([Buffer.from('{"data":'), blob, Buffer.from('}')]);
}

/**
 * Parse the `last` parameter. Absent or empty means the default; anything
 * that is not a non-negative integer is rejected with null.
 */
export function parseLimit(raw: string | undefined, defaultLimit: number): number | null {
  if (raw === undefined || raw.trim() === '') return defaultLimit;
  if (!/^\d+$/.test(raw.trim())) return null;
  return Number(raw.trim());
}
