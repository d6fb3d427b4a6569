/**
 * Pipeline API routes.
 *
 * POST /pipelines - Expand the matrix for a trigger and start the pipeline
 * GET /pipelines - List pipelines, most recent first
 * GET /pipelines/:pipelineId - Get pipeline state, including every job
 * GET /pipelines/:pipelineId/report - Get the gate report
 * POST /pipelines/:pipelineId/cancel - Cancel an in-flight pipeline
 */

import { Router } from 'express';
import { apiError, createTypedError, describeError } from '../domain/errors';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { parseTriggerEvent } from '../matrix/schema';
import { logger } from '../logger';
import { sendError } from './middleware';

const log = logger.child({ module: 'api' });

function parsePaging(query: Record<string, unknown>): { limit: number; offset: number } {
  const rawLimit = typeof query.limit === 'string' ? parseInt(query.limit, 10) : 100;
  const rawOffset = typeof query.offset === 'string' ? parseInt(query.offset, 10) : 0;
  return {
    limit: Number.isNaN(rawLimit) || rawLimit < 1 ? 100 : Math.min(rawLimit, 1000),
    offset: Number.isNaN(rawOffset) || rawOffset < 0 ? 0 : rawOffset,
  };
}

export function createPipelineRoutes(orchestrator: PipelineOrchestrator): Router {
  const router = Router();

  /**
   * POST /pipelines
   * Body: { revision, event }. Execution continues in the background.
   */
  router.post('/pipelines', async (req, res) => {
    try {
      const body: unknown = req.body;
      const revision = body && typeof body === 'object' && 'revision' in body ? body.revision : undefined;
      const rawEvent = body && typeof body === 'object' && 'event' in body ? body.event : undefined;
      const event = parseTriggerEvent(rawEvent);
      if (typeof revision !== 'string' || revision.length === 0 || !event) {
        res.status(400).json(
          apiError(
            createTypedError({
              code: 'VALIDATION.INVALID_INPUT',
              message: 'Body must contain a revision and an event (push, pull-request or pull-request-draft)',
              retryable: false,
            }),
          ),
        );
        return;
      }

      const pipeline = await orchestrator.createPipeline({ revision, event });

      // Execute asynchronously (non-blocking); the outcome is recorded on the pipeline.
      orchestrator.executePipeline(pipeline.id).catch((err: unknown) => {
        log.error('Pipeline execution aborted', { pipelineId: pipeline.id, error: describeError(err) });
      });

      res.status(201).json({ pipeline });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/pipelines', async (req, res) => {
    try {
      const paging = parsePaging(req.query);
      const [pipelines, total] = await Promise.all([orchestrator.listPipelines(paging), orchestrator.countPipelines()]);
      res.json({ pipelines, total, ...paging });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/pipelines/:pipelineId', async (req, res) => {
    try {
      const pipeline = await orchestrator.getPipeline(req.params.pipelineId);
      res.json({ pipeline });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/pipelines/:pipelineId/report', async (req, res) => {
    try {
      const report = await orchestrator.getReport(req.params.pipelineId);
      res.json({ report });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /pipelines/:pipelineId/cancel
   * Body: { reason? }
   */
  router.post('/pipelines/:pipelineId/cancel', async (req, res) => {
    try {
      const body: unknown = req.body;
      const reason = body && typeof body === 'object' && 'reason' in body && typeof body.reason === 'string'
        ? body.reason
        : undefined;
      const pipeline = await orchestrator.cancelPipeline(req.params.pipelineId, reason);
      res.json({ pipeline });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
