/**
 * Metadata service.
 *
 * Request-level operations over runs, artifacts and run logs. The service
 * owns no state besides the store client it is constructed with; a
 * read-merge-write update is not atomic, and a concurrent write to the same
 * path between the read and the write is lost.
 */

import {
  AttributeMap,
  DATA_ATTRIBUTE,
  NAME_ATTRIBUTE,
  artifactPath,
  artifactsPrefix,
  logPath,
  resolveTag,
  resolveTagFilter,
  runPath,
  runsPrefix,
} from '../domain/document';
import { ARTIFACT_ENVELOPE, ARTIFACT_LABEL_PREFIX, EnvelopeSchema, RUN_ENVELOPE, RUN_LABEL_PREFIX } from '../domain/envelope';
import { BackendError, BatchDeleteError, DeleteFailure, NotFoundError } from '../domain/errors';
import { LAST_UPDATE_EPOCH_ATTRIBUTE, deriveAttributes } from '../encoding/attributes';
import { detectFormat, fromJSON, parseDocument, parseJSON, toJSON } from '../encoding/codec';
import { buildArtifactFilter, buildRunFilter } from '../encoding/filter';
import { applyDotPathPatch, parsePatch } from '../encoding/merge-patch';
import { ListingKind, listDocuments, renderDocument, renderListing } from '../listing/listing';
import { ItemCursor, QueryInput, StoreClient } from '../storage/store-client';
import { Logger, logger as rootLogger } from '../logger';

export interface RunQuery {
  project: string;
  name?: string;
  state?: string;
  labels?: string[];
  /** Only runs updated strictly after this epoch (nanoseconds). */
  updatedAfter?: bigint;
  sort?: boolean;
  /** 0 means unbounded. */
  limit?: number;
}

export interface ArtifactQuery {
  project: string;
  name?: string;
  /** Empty means `latest`; `*` means any tag. */
  tag?: string;
  labels?: string[];
}

export class MetadataService {
  private readonly log: Logger;

  constructor(private readonly store: StoreClient, log?: Logger) {
    this.log = log ?? rootLogger.child({ module: 'metadata-service' });
  }

  // --- Logs ---

  async storeLog(project: string, uid: string, body: Buffer): Promise<void> {
    await this.store.putObject(logPath(project, uid), body);
  }

  async getLog(project: string, uid: string): Promise<Buffer> {
    return this.store.getObject(logPath(project, uid));
  }

  // --- Runs ---

  async storeRun(project: string, uid: string, body: Buffer): Promise<void> {
    await this.storeDocument(runPath(project, uid), body, RUN_ENVELOPE, {});
  }

  /**
   * Apply a dot-path patch (JSON or YAML) to a stored run. The merged
   * document keeps the stored document's format, and its index attributes
   * are recomputed from the merged document as a whole.
   */
  async updateRun(project: string, uid: string, patch: Buffer): Promise<void> {
    const path = runPath(project, uid);
    const patchJSON = toJSON(patch);
    parsePatch(patchJSON);

    const item = await this.store.getItem(path, [DATA_ATTRIBUTE]);
    const oldBody = item.getFieldBytes(DATA_ATTRIBUTE);
    if (!oldBody) throw new NotFoundError(path);

    const mergedJSON = applyDotPathPatch(toJSON(oldBody), patchJSON);
    const attributes: AttributeMap = deriveAttributes(RUN_ENVELOPE, parseJSON(mergedJSON));
    attributes[DATA_ATTRIBUTE] = fromJSON(mergedJSON, detectFormat(oldBody));

    this.log.debug('Updating run', { path, attributes: Object.keys(attributes) });
    await this.store.putItem(path, attributes);
  }

  /** `{"data": <stored document>}` */
  async readRun(project: string, uid: string): Promise<Buffer> {
    return this.readDocument(runPath(project, uid));
  }

  async deleteRun(project: string, uid: string): Promise<void> {
    await this.store.deleteObject(runPath(project, uid));
  }

  /** `{"runs": [...]}`; a project without runs lists as empty. */
  async listRuns(query: RunQuery): Promise<Buffer> {
    const filter = buildRunFilter(RUN_LABEL_PREFIX, {
      labels: query.labels,
      name: query.name,
      state: query.state,
      updatedAfter: query.updatedAfter,
    });
    return this.listDocuments('runs', {
      path: runsPrefix(query.project),
      attributeNames: [NAME_ATTRIBUTE, DATA_ATTRIBUTE, LAST_UPDATE_EPOCH_ATTRIBUTE],
      filter,
    }, { sort: query.sort ?? false, limit: query.limit ?? 0 });
  }

  /** Delete every run matching the query; returns how many were deleted. */
  async deleteRuns(query: Omit<RunQuery, 'sort' | 'limit'>): Promise<number> {
    const filter = buildRunFilter(RUN_LABEL_PREFIX, {
      labels: query.labels,
      name: query.name,
      state: query.state,
      updatedAfter: query.updatedAfter,
    });
    return this.deleteMatching(runsPrefix(query.project), filter);
  }

  // --- Artifacts ---

  /**
   * Artifacts are stored twice, under their run uid and under their tag,
   * so either can address the same version.
   */
  async storeArtifact(project: string, uid: string, key: string, tag: string | undefined, body: Buffer): Promise<void> {
    const extra: AttributeMap = { name: key };
    await this.storeDocument(artifactPath(project, key, uid), body, ARTIFACT_ENVELOPE, extra);
    await this.storeDocument(artifactPath(project, key, resolveTag(tag)), body, ARTIFACT_ENVELOPE, extra);
  }

  async readArtifact(project: string, key: string, tag?: string): Promise<Buffer> {
    return this.readDocument(artifactPath(project, key, resolveTag(tag)));
  }

  /** Removes the tag record only; the uid record stays. */
  async deleteArtifact(project: string, key: string, tag?: string): Promise<void> {
    await this.store.deleteObject(artifactPath(project, key, resolveTag(tag)));
  }

  /** `{"artifacts": [...]}` in store order. */
  async listArtifacts(query: ArtifactQuery): Promise<Buffer> {
    const filter = buildArtifactFilter(ARTIFACT_LABEL_PREFIX, {
      labels: query.labels,
      name: query.name,
      tag: resolveTagFilter(query.tag),
    });
    return this.listDocuments('artifacts', {
      path: artifactsPrefix(query.project),
      attributeNames: [NAME_ATTRIBUTE, DATA_ATTRIBUTE],
      filter,
    }, { sort: false, limit: 0 });
  }

  async deleteArtifacts(query: ArtifactQuery): Promise<number> {
    const filter = buildArtifactFilter(ARTIFACT_LABEL_PREFIX, {
      labels: query.labels,
      name: query.name,
      tag: resolveTagFilter(query.tag),
    });
    return this.deleteMatching(artifactsPrefix(query.project), filter);
  }

  // --- Shared ---

  /**
   * Write the document verbatim plus the attributes derived from its
   * envelope. Derived attributes win over `extra` on a name clash.
   */
  private async storeDocument(path: string, body: Buffer, schema: EnvelopeSchema, extra: AttributeMap): Promise<void> {
    const attributes: AttributeMap = {
      ...extra,
      ...deriveAttributes(schema, parseDocument(body)),
      [DATA_ATTRIBUTE]: body,
    };
    this.log.debug('Storing document', { path, attributes: Object.keys(attributes) });
    await this.store.putItem(path, attributes);
  }

  private async readDocument(path: string): Promise<Buffer> {
    const item = await this.store.getItem(path, [DATA_ATTRIBUTE]);
    const body = item.getFieldBytes(DATA_ATTRIBUTE);
    if (!body) throw new NotFoundError(path);
    return renderDocument(body);
  }

  private async listDocuments(
    kind: ListingKind,
    input: QueryInput,
    options: { sort: boolean; limit: number },
  ): Promise<Buffer> {
    const cursor = await this.openQuery(input);
    if (!cursor) return renderListing(kind, []);
    const blobs = await listDocuments(cursor, options);
    this.log.debug('Listed documents', { path: input.path, filter: input.filter, count: blobs.length });
    return renderListing(kind, blobs);
  }

  /** null when the prefix does not exist. */
  private async openQuery(input: QueryInput): Promise<ItemCursor | null> {
    try {
      return await this.store.query(input);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  /**
   * Delete every item under `prefix` matching `filter`. Each deletion is
   * attempted; failures are collected and reported together afterwards,
   * earlier deletions stand. An item already gone counts as deleted.
   */
  private async deleteMatching(prefix: string, filter: string): Promise<number> {
    const cursor = await this.openQuery({ path: prefix, attributeNames: [NAME_ATTRIBUTE], filter });
    if (!cursor) return 0;

    const items = await cursor.all();
    const failures: DeleteFailure[] = [];
    let deleted = 0;
    for (const item of items) {
      const name = item.getFieldString(NAME_ATTRIBUTE);
      if (!name) {
        this.log.warn('Matched item has no name, skipping', { prefix });
        continue;
      }
      const path = `${prefix}${name}`;
      try {
        await this.store.deleteObject(path);
        deleted++;
      } catch (err) {
        if (err instanceof NotFoundError) {
          deleted++;
        } else if (err instanceof BackendError) {
          this.log.warn('Deletion failed', { path, statusCode: err.statusCode });
          failures.push({ path, statusCode: err.statusCode, message: err.message });
        } else {
          throw err;
        }
      }
    }

    this.log.info('Deleted matching items', { prefix, filter, deleted, failed: failures.length });
    if (failures.length > 0) {
      throw new BatchDeleteError(failures, deleted + failures.length);
    }
    return deleted;
  }
}
