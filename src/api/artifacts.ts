/**
 * Artifact API routes.
 *
 * POST   /artifact/:project/:uid?key=&tag= — Store an artifact under its uid and its tag
 * GET    /artifact/:project?key=&tag=      — Read an artifact by tag (default "latest")
 * DELETE /artifact/:project?key=&tag=      — Delete an artifact's tag record
 * GET    /artifacts                        — List artifacts: {"artifacts": [...]}
 * DELETE /artifacts                        — Delete every artifact record matching the query
 */

import { Request, Router } from 'express';
import { ArtifactQuery, MetadataService } from '../service/metadata-service';
import { ContextRequest, queryParam, queryParams, rawBody, requireQueryParam, sendError } from './middleware';

/** `tag` empty → latest, `*` → any tag. */
function artifactQuery(req: Request): ArtifactQuery {
  return {
    project: requireQueryParam(req, 'project'),
    name: queryParam(req, 'name'),
    tag: queryParam(req, 'tag'),
    labels: queryParams(req, 'label'),
  };
}

export function createArtifactRoutes(service: MetadataService): Router {
  const router = Router();

  router.post('/artifact/:project/:uid', async (req: ContextRequest, res) => {
    try {
      const key = requireQueryParam(req, 'key');
      await service.storeArtifact(req.params.project, req.params.uid, key, queryParam(req, 'tag'), rawBody(req));
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.get('/artifact/:project', async (req: ContextRequest, res) => {
    try {
      const key = requireQueryParam(req, 'key');
      const body = await service.readArtifact(req.params.project, key, queryParam(req, 'tag'));
      res.type('application/json').send(body);
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.delete('/artifact/:project', async (req: ContextRequest, res) => {
    try {
      const key = requireQueryParam(req, 'key');
      await service.deleteArtifact(req.params.project, key, queryParam(req, 'tag'));
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.get('/artifacts', async (req: ContextRequest, res) => {
    try {
      const body = await service.listArtifacts(artifactQuery(req));
      res.type('application/json').send(body);
    } catch (err) {
      sendError(req, res, err);
    }
  });

  router.delete('/artifacts', async (req: ContextRequest, res) => {
    try {
      const deleted = await service.deleteArtifacts(artifactQuery(req));
      req.log?.info('Artifacts deleted', { deleted });
      res.status(200).end();
    } catch (err) {
      sendError(req, res, err);
    }
  });

  return router;
}
