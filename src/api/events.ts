/**
 * Event stream API routes.
 *
 * GET /pipelines/:pipelineId/events        - List events for a pipeline
 * GET /pipelines/:pipelineId/events/stream - Server-sent events, replayed then live
 */

import { Router } from 'express';
import { v4 as uuid } from 'uuid';
import { DataPlaneEvent, DataPlaneEventType } from '../domain/events';
import { DataPlanePublisher } from '../data-plane/publisher';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { sendError } from './middleware';

const VALID_EVENT_TYPES: readonly DataPlaneEventType[] = [
  'pipeline.created', 'pipeline.started', 'pipeline.succeeded', 'pipeline.failed', 'pipeline.canceled',
  'job.started', 'job.phase', 'job.succeeded', 'job.failed', 'job.skipped',
  'artifact.created', 'manifest.assembled',
];

const TERMINAL_EVENT_TYPES: readonly DataPlaneEventType[] = ['pipeline.succeeded', 'pipeline.failed', 'pipeline.canceled'];

function parseEventTypes(raw: unknown): DataPlaneEventType[] | undefined {
  if (typeof raw !== 'string') return undefined;
  const requested = raw.split(',');
  return VALID_EVENT_TYPES.filter((type) => requested.includes(type));
}

export function createEventRoutes(orchestrator: PipelineOrchestrator, publisher: DataPlanePublisher): Router {
  const router = Router();

  /**
   * GET /pipelines/:pipelineId/events?types=job.failed,job.skipped
   */
  router.get('/pipelines/:pipelineId/events', async (req, res) => {
    try {
      await orchestrator.getPipeline(req.params.pipelineId);
      const events = await publisher.getEventsByPipeline(req.params.pipelineId, parseEventTypes(req.query.types));
      res.json({ events, total: events.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /pipelines/:pipelineId/events/stream
   *
   * Stored events first, then live ones. The stream ends after the
   * pipeline's terminal event or when the client disconnects.
   */
  router.get('/pipelines/:pipelineId/events/stream', async (req, res) => {
    const { pipelineId } = req.params;
    const sent = new Set<string>();
    let pending: DataPlaneEvent[] | undefined = [];
    let ended = false;

    const send = (event: DataPlaneEvent) => {
      if (ended || sent.has(event.id)) return;
      sent.add(event.id);
      res.write(`id: ${event.id}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
      if (TERMINAL_EVENT_TYPES.includes(event.type)) finish();
    };

    // Subscribe before reading history; live events wait in `pending` until the replay is done.
    const unsubscribe = publisher.subscribe({
      id: `sse_${uuid()}`,
      pipelineId,
      callback: (event) => {
        if (pending) pending.push(event);
        else send(event);
      },
    });

    const finish = (): void => {
      if (ended) return;
      ended = true;
      unsubscribe();
      res.end();
    };

    let history: DataPlaneEvent[];
    try {
      await orchestrator.getPipeline(pipelineId);
      history = await publisher.getEventsByPipeline(pipelineId);
    } catch (err) {
      unsubscribe();
      sendError(res, err);
      return;
    }

    res.on('close', finish);
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    const live = pending ?? [];
    pending = undefined;
    for (const event of [...history, ...live]) send(event);
  });

  return router;
}
