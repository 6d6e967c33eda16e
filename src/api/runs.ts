/**
 * Run API routes.
 *
 * POST   /run/:project/:uid — Store (or fully replace) a run document
 * PATCH  /run/:project/:uid — Apply a dot-path patch to a stored run
 * GET    /run/:project/:uid — Read a run: {"data": <document>}
 * DELETE /run/:project/:uid — Delete a run
 * GET    /runs              — List runs: {"runs": [...]}
 * DELETE /runs              — Delete every run matching the query
 */

import { Request, Router } from 'express';
import { parseTimestampEpoch } from '../encoding/attributes';
import { DEFAULT_RUN_LIMIT, parseLimit } from '../listing/listing';
import { MetadataService, RunQuery } from '../service/metadata-service';
import {
  ContextRequest,
  RequestValidationError,
  queryParam,
  queryParams,
  rawBody,
  requireQueryParam,
  sendError,
} from './middleware';

/** `updated_after`: a `YYYY-MM-DD HH:MM:SS.ffffff` timestamp or epoch nanoseconds. */
function parseUpdatedAfter(raw: string | undefined): bigint | undefined {
  if (raw === undefined || raw === '') return undefined;
  if (/^\d+$/.test(raw)) return BigInt(raw);
  const epoch = parseTimestampEpoch(raw);
  if (epoch === null) {
    throw new RequestValidationError(`Invalid 'updated_after' parameter: ${raw}`, { parameter: 'updated_after' });
  }
  return epoch;
}

function runFilterQuery(req: Request): Omit<RunQuery, 'sort' | 'limit'> {
  return {
    project: requireQueryParam(req, 'project'),
    name: queryParam(req, 'name'),
    state: queryParam(req, 'state'),
    labels: queryParams(req, 'label'),
    updatedAfter: parseUpdatedAfter(queryParam(req, 'updated_after')),
  };
}

export function createRunRoutes(service: MetadataService): Router {
  const router = Router();

  router.post('/run/:project/:uid', async (req: ContextRequest, res) => {
    try {
      await service.storeRun(req.params.project, req.params.uid, rawBody(req));
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.patch('/run/:project/:uid', async (req: ContextRequest, res) => {
    try {
      await service.updateRun(req.params.project, req.params.uid, rawBody(req));
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.get('/run/:project/:uid', async (req: ContextRequest, res) => {
    try {
      const body = await service.readRun(req.params.project, req.params.uid);
      res.type('application/json').send(body);
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.delete('/run/:project/:uid', async (req: ContextRequest, res) => {
    try {
      await service.deleteRun(req.params.project, req.params.uid);
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  /**
   * GET /runs?project=&name=&state=&label=&updated_after=&sort=true&last=
   * `last` defaults to 30 when absent; 0 lists everything.
   */
  router.get('/runs', async (req: ContextRequest, res) => {
    try {
      const limit = parseLimit(queryParam(req, 'last'), DEFAULT_RUN_LIMIT);
      if (limit === null) {
        throw new RequestValidationError(`Invalid 'last' parameter: ${queryParam(req, 'last')}`, { parameter: 'last' });
      }
      const body = await service.listRuns({
        ...runFilterQuery(req),
        sort: queryParam(req, 'sort') === 'true',
        limit,
      });
      res.type('application/json').send(body);
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.delete('/runs', async (req: ContextRequest, res) => {
    try {
      const deleted = await service.deleteRuns(runFilterQuery(req));
      req.log?.info('Runs deleted', { deleted });
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  return router;
}
