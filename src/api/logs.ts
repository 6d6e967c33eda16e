/**
 * Run log routes.
 *
 * POST /log/:project/:uid — Store a run's log output
 * GET  /log/:project/:uid — Read it back
 */

import { Router } from 'express';
import { MetadataService } from '../service/metadata-service';
import { ContextRequest, rawBody, sendError } from './middleware';

export function createLogRoutes(service: MetadataService): Router {
  const router = Router();

  router.post('/log/:project/:uid', async (req: ContextRequest, res) => {
    try {
      await service.storeLog(req.params.project, req.params.uid, rawBody(req));
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.get('/log/:project/:uid', async (req: ContextRequest, res) => {
    try {
      const body = await service.getLog(req.params.project, req.params.uid);
      res.type('text/plain').send(body);
    } catch (err) {
      sendError(req, res, err);
    }
  });

  return router;
}
