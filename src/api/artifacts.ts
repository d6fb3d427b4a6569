/**
 * Artifact API routes.
 *
 * GET /pipelines/:pipelineId/artifacts - List artifacts produced by a pipeline
 * GET /artifacts/:artifactId/content - Download an artifact's content
 */

import { Router } from 'express';
import { apiError, createTypedError, notFoundError } from '../domain/errors';
import { ArtifactService } from '../artifacts/artifact-service';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { Store } from '../storage/store';
import { sendError } from './middleware';

const CONTENT_TYPES: Record<string, string> = {
  log: 'text/plain; charset=utf-8',
  diff: 'text/x-diff; charset=utf-8',
  report: 'application/json',
  binary: 'application/octet-stream',
};

export function createArtifactRoutes(
  store: Store,
  orchestrator: PipelineOrchestrator,
  artifacts: ArtifactService,
): Router {
  const router = Router();

  router.get('/pipelines/:pipelineId/artifacts', async (req, res) => {
    try {
      // Verify pipeline exists
      await orchestrator.getPipeline(req.params.pipelineId);
      const list = await store.artifacts.listByPipeline(req.params.pipelineId, { limit: Number.MAX_SAFE_INTEGER });
      res.json({ artifacts: list });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/artifacts/:artifactId/content', async (req, res) => {
    try {
      const artifact = await store.artifacts.getById(req.params.artifactId);
      if (!artifact) {
        res.status(404).json(apiError(notFoundError('Artifact', req.params.artifactId)));
        return;
      }
      if (artifact.pointer.kind === 'image-registry') {
        res.status(409).json(
          apiError(
            createTypedError({
              code: 'ARTIFACT.NOT_DOWNLOADABLE',
              message: `Artifact ${artifact.id} lives in an image registry: ${artifact.pointer.uri}`,
              retryable: false,
              details: { location: artifact.pointer.uri },
            }),
          ),
        );
        return;
      }
      const content = await artifacts.read(artifact);
      res.type(CONTENT_TYPES[artifact.type] ?? 'application/octet-stream').send(content);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
